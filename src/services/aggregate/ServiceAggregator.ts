import { DateTime } from 'luxon';
import { Bearer } from '../../domain/bearer/Bearer';
import {
  AssembledObject,
  ContentTypes,
  MotParameter,
  serviceScopeId,
} from '../../domain/carousel/AssembledObject';
import {
  CandidateServer,
  DiscoveryResponse,
  baseUrl,
} from '../../domain/discovery/DiscoveryResponse';
import {
  Service,
  dabBearers,
  restrictToMultiplex,
  withoutEmptyGenres,
} from '../../domain/spi/ServiceInformation';
import { SpiXmlWriter } from '../../infrastructure/spi/SpiXmlWriter';
import { isEncodableMotTime } from '../../infrastructure/mot/MotTime';
import { ImageNormalizer } from '../image/ImageNormalizer';
import { SourceFetcher, orderCandidates } from '../fetch/SourceFetcher';
import {
  applyScope,
  backfillShortDescriptions,
  documentScope,
} from '../scope/ScopeCalculator';
import { createLogger } from '../../utils/logger';
import { RunContext } from './RunContext';

const logger = createLogger('ServiceAggregator');

export const SPI_PATH = '/radiodns/spi/3.1';

export interface AggregationResult {
  services: Service[];
  objects: AssembledObject[];
}

export interface ServiceAggregatorOptions {
  fetcher: SourceFetcher;
  imageNormalizer: ImageNormalizer;
  writer?: SpiXmlWriter;
}

export function serviceInformationUrl(response: DiscoveryResponse, server: CandidateServer): string {
  return `${baseUrl(response, server)}${SPI_PATH}/SI.xml`;
}

function dayStamp(now: Date, offset: number): string {
  return DateTime.fromJSDate(now, { zone: 'utc' }).startOf('day').plus({ days: offset }).toFormat('yyyyMMdd');
}

export function programmeInformationUrl(
  response: DiscoveryResponse,
  server: CandidateServer,
  bearer: Bearer,
  now: Date,
  offset: number
): string {
  return `${baseUrl(response, server)}${SPI_PATH}/${bearer.path}/${dayStamp(now, offset)}_PI.xml`;
}

export function programmeInformationName(bearer: Bearer, now: Date, offset: number): string {
  return `${dayStamp(now, offset)}_${bearer.gcc}_${bearer.hexEid}_${bearer.hexSid}_${bearer.scids.toString(16)}_PI.xml`;
}

/**
 * Drives the per-response pipeline:
 * candidate servers -> SI -> logos -> N days of PI per bearer.
 */
export class ServiceAggregator {
  private readonly fetcher: SourceFetcher;
  private readonly imageNormalizer: ImageNormalizer;
  private readonly writer: SpiXmlWriter;

  constructor(options: ServiceAggregatorOptions) {
    this.fetcher = options.fetcher;
    this.imageNormalizer = options.imageNormalizer;
    this.writer = options.writer ?? new SpiXmlWriter();
  }

  /**
   * Aggregate every response in order. Results keep discovery order.
   */
  public async aggregateAll(responses: readonly DiscoveryResponse[], context: RunContext): Promise<AggregationResult> {
    const services: Service[] = [];
    const objects: AssembledObject[] = [];
    for (const response of responses) {
      const result = await this.aggregate(response, context);
      services.push(...result.services);
      objects.push(...result.objects);
    }
    return { services, objects };
  }

  public async aggregate(response: DiscoveryResponse, context: RunContext): Promise<AggregationResult> {
    const services: Service[] = [];
    const objects: AssembledObject[] = [];
    const candidates = orderCandidates(response.candidates);

    if (candidates.length === 0) {
      logger.warn({ fqdn: response.fqdn }, 'No candidate servers');
      return { services, objects };
    }

    for (const server of candidates) {
      const url = serviceInformationUrl(response, server);
      const outcome = await this.fetcher.fetchServiceInformation(url, response.bearers, context.credentials.lookupUrl(url));

      if (outcome.status === 'not-found') {
        logger.info({ fqdn: response.fqdn, url }, 'No SI document on server, trying next');
        continue;
      }
      if (outcome.status === 'failed') {
        logger.info({ fqdn: response.fqdn, url, reason: outcome.reason }, 'SI fetch failed, trying next server');
        continue;
      }
      if (outcome.value.length === 0) {
        logger.info({ fqdn: response.fqdn, url }, 'SI document lists none of the requested bearers, trying next');
        continue;
      }

      logger.info({ fqdn: response.fqdn, url, services: outcome.value.length }, 'Fetched service information');

      for (const published of outcome.value) {
        const service = restrictToMultiplex(withoutEmptyGenres(published), context.multiplex.ensemble);
        if (!service) {
          logger.debug({ fqdn: response.fqdn }, 'Service has no bearer on this multiplex');
          continue;
        }

        const logos = await this.imageNormalizer.normalize(service, url, context.credentials, context.logoStems);
        objects.push(...logos.objects);
        services.push(logos.service);

        const wanted = new Set(response.bearers.map((bearer) => bearer.uri));
        for (const bearer of dabBearers(logos.service)) {
          if (!wanted.has(bearer.uri) || context.scheduledBearers.has(bearer.uri)) {
            continue;
          }
          context.scheduledBearers.add(bearer.uri);
          objects.push(...(await this.fetchSchedules(response, server, bearer, context)));
        }
      }

      if (context.sourcePolicy === 'first-success') {
        break;
      }
    }

    return { services, objects };
  }

  /**
   * One PI object per day that has a usable schedule. Failures only drop that day.
   */
  private async fetchSchedules(
    response: DiscoveryResponse,
    server: CandidateServer,
    bearer: Bearer,
    context: RunContext
  ): Promise<AssembledObject[]> {
    const objects: AssembledObject[] = [];

    for (let day = 0; day < context.days; day++) {
      const url = programmeInformationUrl(response, server, bearer, context.now, day);
      const outcome = await this.fetcher.fetchProgrammeInformation(url, context.credentials.lookupUrl(url));

      if (outcome.status === 'not-found') {
        logger.debug({ bearer: bearer.uri, day, url }, 'No schedule published for day');
        continue;
      }
      if (outcome.status === 'failed') {
        logger.warn({ bearer: bearer.uri, day, url, reason: outcome.reason, error: outcome.error.message }, 'Skipping schedule');
        continue;
      }

      const scope = documentScope(outcome.value);
      if (!scope.start || !scope.end) {
        logger.warn({ bearer: bearer.uri, day, url, scope }, 'Schedule scope could not be determined; skipping');
        continue;
      }

      if (!isEncodableMotTime(scope.start) || !isEncodableMotTime(scope.end)) {
        logger.warn({ bearer: bearer.uri, day, url, scope }, 'Schedule scope is outside the MOT time range; skipping');
        continue;
      }

      const document = backfillShortDescriptions(applyScope(outcome.value, scope, bearer));
      const parameters: MotParameter[] = [
        { kind: 'ScopeId', value: serviceScopeId(bearer) },
        { kind: 'ScopeStart', value: scope.start },
        { kind: 'ScopeEnd', value: scope.end },
      ];

      objects.push({
        name: programmeInformationName(bearer, context.now, day),
        body: this.writer.writeProgrammeInformation(document),
        contentType: ContentTypes.programmeInformation,
        parameters,
      });
      logger.debug({ bearer: bearer.uri, day, start: scope.start, end: scope.end }, 'Packaged schedule');
    }

    return objects;
  }
}
