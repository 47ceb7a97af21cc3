import { parseArgs } from 'util';
import { z } from 'zod';
import { PACKET_SIZES, isPacketSize } from '../infrastructure/msc/PacketEncoder';
import { ConfigurationError } from '../utils/errors';

export const USAGE = `Usage: epg-carousel [options] <mux-config>

Options:
  -o <path>   output file (default output.dat)
  -X          verbose logging
  -d <int>    days of programme information to fetch, 0 for SI only (default 2)
  -p <int>    packet size in bytes: ${PACKET_SIZES.join(', ')} (default 96)
  -a <int>    packet address (default 1)
  -D          write MOT data groups instead of packets
  -c <path>   CSV file of fqdn,credential pairs
  -h          show this help`;

const optionsSchema = z.object({
  muxConfig: z.string().min(1, 'multiplex configuration file is required'),
  output: z.string().min(1).default('output.dat'),
  verbose: z.boolean().default(false),
  days: z.coerce.number().int().min(0).default(2),
  packetSize: z.coerce
    .number()
    .int()
    .refine(isPacketSize, `packet size must be one of ${PACKET_SIZES.join(', ')}`)
    .default(96),
  address: z.coerce.number().int().min(1).max(1023).default(1),
  dataGroups: z.boolean().default(false),
  credentials: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof optionsSchema>;

export type ParsedCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliOptions(argv: readonly string[]): ParsedCommand {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  if (parsed.values.help) {
    return { kind: 'help' };
  }
  if (parsed.positionals.length > 1) {
    throw new ConfigurationError(`Unexpected arguments: ${parsed.positionals.slice(1).join(' ')}`);
  }

  const result = optionsSchema.safeParse({
    muxConfig: parsed.positionals[0] ?? '',
    output: parsed.values.output,
    verbose: parsed.values.verbose,
    days: parsed.values.days,
    packetSize: parsed.values['packet-size'],
    address: parsed.values.address,
    dataGroups: parsed.values.datagroups,
    credentials: parsed.values.credentials,
  });
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`).join('; ')
    );
  }
  return { kind: 'run', options: result.data };
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: 'string', short: 'o' },
      verbose: { type: 'boolean', short: 'X' },
      days: { type: 'string', short: 'd' },
      'packet-size': { type: 'string', short: 'p' },
      address: { type: 'string', short: 'a' },
      datagroups: { type: 'boolean', short: 'D' },
      credentials: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
