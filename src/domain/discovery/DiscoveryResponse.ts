import { Bearer } from '../bearer/Bearer';

export type ApplicationProtocol = 'radiospi' | 'radioepg';

export interface CandidateServer {
  priority: number;
  weight: number;
  port: number;
  target: string;
}

/**
 * One discovered authoritative domain and the servers that publish its SPI documents
 */
export interface DiscoveryResponse {
  fqdn: string;
  bearers: Bearer[];
  candidates: CandidateServer[];
  protocol: ApplicationProtocol;
}

export interface EnsembleIdentity {
  ecc: number;
  eid: number;
  longName: string;
  shortName: string;
}

/**
 * Parsed multiplex configuration: ensemble identity plus the bearers it carries
 */
export interface Multiplex {
  ensemble: EnsembleIdentity;
  bearers: Bearer[];
}

export function schemeFor(protocol: ApplicationProtocol): 'https' | 'http' {
  return protocol === 'radiospi' ? 'https' : 'http';
}

export function baseUrl(response: DiscoveryResponse, server: CandidateServer): string {
  const scheme = schemeFor(response.protocol);
  const host = server.target.replace(/\.$/, '');
  const defaultPort = scheme === 'https' ? 443 : 80;
  return server.port === defaultPort ? `${scheme}://${host}` : `${scheme}://${host}:${server.port}`;
}
