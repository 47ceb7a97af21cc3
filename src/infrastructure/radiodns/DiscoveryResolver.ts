import { Resolver } from 'dns/promises';
import type { SrvRecord } from 'dns';
import { Bearer } from '../../domain/bearer/Bearer';
import {
  ApplicationProtocol,
  CandidateServer,
  DiscoveryResponse,
} from '../../domain/discovery/DiscoveryResponse';
import { config } from '../../config/env';
import { createLogger } from '../../utils/logger';

const logger = createLogger('DiscoveryResolver');

/**
 * The subset of dns/promises the resolver needs
 */
export interface DnsClient {
  resolveCname(hostname: string): Promise<string[]>;
  resolveSrv(hostname: string): Promise<SrvRecord[]>;
}

export interface DiscoveryResolverOptions {
  dns?: DnsClient;
  radiodnsRoot?: string;
}

// Newer SPI application first, legacy EPG application as fallback
const APPLICATIONS: readonly ApplicationProtocol[] = ['radiospi', 'radioepg'];

/**
 * RadioDNS lookup: bearer -> authoritative FQDN (CNAME) -> SPI servers (SRV)
 */
export class DiscoveryResolver {
  private readonly dns: DnsClient;
  private readonly radiodnsRoot: string;

  constructor(options: DiscoveryResolverOptions = {}) {
    this.dns = options.dns ?? new Resolver();
    this.radiodnsRoot = options.radiodnsRoot ?? config.discovery.radiodnsRoot;
  }

  /**
   * RadioDNS query name for a bearer: {scids}.{sid}.{eid}.{gcc}.dab.{root}
   */
  public queryName(bearer: Bearer): string {
    return [bearer.scids.toString(16), bearer.hexSid, bearer.hexEid, bearer.gcc, 'dab', this.radiodnsRoot].join('.');
  }

  /**
   * Resolve every bearer and group them by authoritative FQDN.
   * Responses keep the order in which their FQDN was first seen.
   */
  public async resolve(bearers: readonly Bearer[]): Promise<DiscoveryResponse[]> {
    const responses = new Map<string, DiscoveryResponse>();

    for (const bearer of bearers) {
      const fqdn = await this.lookupFqdn(bearer);
      if (!fqdn) {
        continue;
      }

      const existing = responses.get(fqdn);
      if (existing) {
        existing.bearers.push(bearer);
        continue;
      }

      const application = await this.lookupServers(fqdn);
      if (!application) {
        logger.info({ bearer: bearer.uri, fqdn }, 'No SPI application advertised');
        continue;
      }

      responses.set(fqdn, {
        fqdn,
        bearers: [bearer],
        candidates: application.candidates,
        protocol: application.protocol,
      });
    }

    logger.info(
      { bearers: bearers.length, responses: responses.size },
      'RadioDNS discovery completed'
    );
    return [...responses.values()];
  }

  private async lookupFqdn(bearer: Bearer): Promise<string | null> {
    const name = this.queryName(bearer);
    try {
      const [fqdn] = await this.dns.resolveCname(name);
      if (!fqdn) {
        return null;
      }
      logger.debug({ bearer: bearer.uri, fqdn }, 'Resolved authoritative FQDN');
      return fqdn.replace(/\.$/, '').toLowerCase();
    } catch (error) {
      logger.debug({ bearer: bearer.uri, name, error }, 'Bearer not registered with RadioDNS');
      return null;
    }
  }

  private async lookupServers(
    fqdn: string
  ): Promise<{ protocol: ApplicationProtocol; candidates: CandidateServer[] } | null> {
    for (const protocol of APPLICATIONS) {
      const name = `_${protocol}._tcp.${fqdn}`;
      try {
        const records = await this.dns.resolveSrv(name);
        if (records.length > 0) {
          return {
            protocol,
            candidates: records.map((record) => ({
              priority: record.priority,
              weight: record.weight,
              port: record.port,
              target: record.name.replace(/\.$/, ''),
            })),
          };
        }
      } catch (error) {
        logger.debug({ fqdn, name, error }, 'SRV lookup failed');
      }
    }
    return null;
  }
}
