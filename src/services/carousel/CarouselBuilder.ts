import { AssembledObject } from '../../domain/carousel/AssembledObject';
import { MuxConfigParser } from '../../infrastructure/muxconfig/MuxConfigParser';
import { DiscoveryResolver } from '../../infrastructure/radiodns/DiscoveryResolver';
import { MotDirectoryEncoder } from '../../infrastructure/mot/MotDirectoryEncoder';
import { PacketSize, encodeTransportPackets } from '../../infrastructure/msc/PacketEncoder';
import { ServiceAggregator } from '../aggregate/ServiceAggregator';
import { SourcePolicy, createRunContext } from '../aggregate/RunContext';
import { DirectoryAssembler } from '../assemble/DirectoryAssembler';
import { CredentialStore } from '../fetch/CredentialStore';
import { createLogger, logPerformance } from '../../utils/logger';

const logger = createLogger('CarouselBuilder');

export interface CarouselOptions {
  days: number;
  packetSize: PacketSize;
  address: number;
  /** Emit MOT data groups instead of packets */
  dataGroupsOnly: boolean;
  credentials: CredentialStore;
  sourcePolicy: SourcePolicy;
  now?: Date;
}

export interface CarouselBuilderDependencies {
  muxConfigParser: Pick<MuxConfigParser, 'load'>;
  resolver: Pick<DiscoveryResolver, 'resolve'>;
  aggregator: Pick<ServiceAggregator, 'aggregateAll'>;
  assembler: Pick<DirectoryAssembler, 'assemble'>;
  encoder: Pick<MotDirectoryEncoder, 'encodeDirectory'>;
}

export interface Carousel {
  objects: AssembledObject[];
  /** Data groups or packets, in transmission order */
  fragments: Buffer[];
}

/**
 * One run: multiplex configuration in, encoded carousel out
 */
export class CarouselBuilder {
  constructor(private readonly deps: CarouselBuilderDependencies) {}

  public async build(muxConfigPath: string, options: CarouselOptions): Promise<Carousel> {
    const startTime = Date.now();
    const multiplex = await this.deps.muxConfigParser.load(muxConfigPath);
    const responses = await this.deps.resolver.resolve(multiplex.bearers);

    const context = createRunContext({
      now: options.now ?? new Date(),
      days: options.days,
      multiplex,
      credentials: options.credentials,
      sourcePolicy: options.sourcePolicy,
    });

    const { services, objects } = await this.deps.aggregator.aggregateAll(responses, context);
    // Throws NoServicesFoundError before anything is encoded
    const assembled = this.deps.assembler.assemble(objects, services, multiplex.ensemble, context.now);

    const dataGroups = this.deps.encoder.encodeDirectory(assembled);
    const fragments = options.dataGroupsOnly
      ? dataGroups
      : encodeTransportPackets(dataGroups, options.address, options.packetSize);

    logger.info(
      {
        responses: responses.length,
        services: services.length,
        objects: assembled.length,
        fragments: fragments.length,
        format: options.dataGroupsOnly ? 'datagroups' : 'packets',
      },
      'Carousel built'
    );
    logPerformance('Carousel build', startTime);

    return { objects: assembled, fragments };
  }
}
