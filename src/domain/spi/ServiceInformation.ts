import { Bearer } from '../bearer/Bearer';
import { Description, Genre, Link, MediaItem, Name } from './common';

export interface ServiceBearer {
  uri: string;
  cost?: number;
  offset?: number;
  mimeValue?: string;
  bitrate?: number;
}

export interface RadioDnsLookup {
  fqdn: string;
  serviceIdentifier: string;
}

/**
 * A broadcast station record from an SI document
 */
export interface Service {
  names: Name[];
  descriptions: Description[];
  genres: Genre[];
  media: MediaItem[];
  bearers: ServiceBearer[];
  links: Link[];
  keywords: string[];
  radiodns?: RadioDnsLookup;
}

export interface ServiceInformation {
  version?: number;
  creationTime?: Date;
  originator?: string;
  serviceProvider?: string;
  services: Service[];
}

/**
 * DAB bearers a service is carried on (non-DAB bearers are ignored)
 */
export function dabBearers(service: Service): Bearer[] {
  const result: Bearer[] = [];
  for (const bearer of service.bearers) {
    const parsed = Bearer.parse(bearer.uri);
    if (parsed) {
      result.push(parsed);
    }
  }
  return result;
}

/**
 * Whether any of the service's bearers is in the requested set
 */
export function isCarriedOn(service: Service, bearers: readonly Bearer[]): boolean {
  const wanted = new Set(bearers.map((bearer) => bearer.uri));
  return dabBearers(service).some((bearer) => wanted.has(bearer.uri));
}

/**
 * Drop genre entries without a reference
 */
export function withoutEmptyGenres(service: Service): Service {
  return {
    ...service,
    genres: service.genres.filter((genre) => genre.href.trim() !== ''),
  };
}

/**
 * Keep only the DAB bearers of the given multiplex. Returns null when none remain.
 */
export function restrictToMultiplex(
  service: Service,
  multiplex: { ecc: number; eid: number }
): Service | null {
  const bearers = service.bearers.filter((bearer) => {
    const parsed = Bearer.parse(bearer.uri);
    return parsed !== null && parsed.isSameMultiplex(multiplex);
  });
  if (bearers.length === 0) {
    return null;
  }
  return { ...service, bearers };
}
