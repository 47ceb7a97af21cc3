import {
  AssembledObject,
  ContentTypes,
  ensembleScopeId,
} from '../../domain/carousel/AssembledObject';
import { EnsembleIdentity } from '../../domain/discovery/DiscoveryResponse';
import { Service, restrictToMultiplex } from '../../domain/spi/ServiceInformation';
import { SpiXmlWriter } from '../../infrastructure/spi/SpiXmlWriter';
import { NoServicesFoundError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('DirectoryAssembler');

export const SERVICE_INFORMATION_NAME = 'SI.xml';

export interface DirectoryAssemblerOptions {
  writer?: SpiXmlWriter;
}

/**
 * Produces the final object list: logos and schedules in discovery order,
 * followed by one consolidated SI object for the ensemble.
 */
export class DirectoryAssembler {
  private readonly writer: SpiXmlWriter;

  constructor(options: DirectoryAssemblerOptions = {}) {
    this.writer = options.writer ?? new SpiXmlWriter();
  }

  public assemble(
    objects: readonly AssembledObject[],
    services: readonly Service[],
    ensemble: EnsembleIdentity,
    now: Date = new Date()
  ): AssembledObject[] {
    const published = services
      .map((service) => restrictToMultiplex(service, ensemble))
      .filter((service): service is Service => service !== null);

    if (published.length === 0) {
      throw new NoServicesFoundError(
        `No services found for ensemble ${ensemble.ecc.toString(16)}.${ensemble.eid.toString(16).padStart(4, '0')}`
      );
    }

    const serviceInformation: AssembledObject = {
      name: SERVICE_INFORMATION_NAME,
      body: this.writer.writeServiceInformation(published, ensemble, now),
      contentType: ContentTypes.serviceInformation,
      parameters: [{ kind: 'ScopeId', value: ensembleScopeId(ensemble) }],
    };

    // Object names are unique within a directory; the first object with a name wins
    const names = new Set<string>();
    const ordered: AssembledObject[] = [];
    for (const object of objects) {
      if (names.has(object.name) || object.name === SERVICE_INFORMATION_NAME) {
        logger.warn({ name: object.name }, 'Dropping object with duplicate name');
        continue;
      }
      names.add(object.name);
      ordered.push(object);
    }
    ordered.push(serviceInformation);

    logger.info(
      { services: published.length, objects: ordered.length, bytes: ordered.reduce((sum, object) => sum + object.body.length, 0) },
      'Assembled carousel objects'
    );
    return ordered;
  }
}
