import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('CredentialStore');

function normalizeHost(host: string): string {
  return host.toLowerCase().replace(/\.$/, '');
}

const rowSchema = z.object({
  fqdn: z
    .string()
    .min(1)
    .regex(/^[a-z0-9.-]+$/i, 'must be a host name')
    .transform(normalizeHost),
  credential: z.string().min(1),
});

/**
 * Access credentials keyed by host name, loaded from "fqdn,credential" lines
 */
export class CredentialStore {
  private readonly credentials: Map<string, string>;

  constructor(entries: Iterable<[string, string]> = []) {
    this.credentials = new Map();
    for (const [host, credential] of entries) {
      this.credentials.set(normalizeHost(host), credential);
    }
  }

  public static empty(): CredentialStore {
    return new CredentialStore();
  }

  public static fromCsv(text: string): CredentialStore {
    const entries: Array<[string, string]> = [];

    text.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (line === '' || line.startsWith('#')) {
        return;
      }

      const separator = line.indexOf(',');
      const parsed = rowSchema.safeParse({
        fqdn: separator >= 0 ? line.slice(0, separator).trim() : line,
        credential: separator >= 0 ? line.slice(separator + 1).trim() : '',
      });
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigurationError(
          `Invalid credential entry on line ${index + 1}: ${issue.path.join('.')} ${issue.message}`
        );
      }
      entries.push([parsed.data.fqdn, parsed.data.credential]);
    });

    return new CredentialStore(entries);
  }

  public static async load(filePath: string): Promise<CredentialStore> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read credentials file ${filePath}: ${error}`);
    }
    const store = CredentialStore.fromCsv(text);
    logger.info({ file: filePath, domains: store.size }, 'Loaded access credentials');
    return store;
  }

  public get size(): number {
    return this.credentials.size;
  }

  /**
   * Credential for exactly this host, if any
   */
  public lookup(host: string): string | undefined {
    return this.credentials.get(normalizeHost(host));
  }

  /**
   * Credential for the host a URL points at
   */
  public lookupUrl(url: string): string | undefined {
    return this.lookup(new URL(url).hostname);
  }
}
