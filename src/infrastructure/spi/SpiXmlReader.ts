import { Duration } from 'luxon';
import {
  Description,
  Genre,
  Link,
  MEDIA_TYPES,
  MediaItem,
  MediaType,
  Name,
} from '../../domain/spi/common';
import { Service, ServiceBearer, ServiceInformation } from '../../domain/spi/ServiceInformation';
import {
  Location,
  Programme,
  ProgrammeInformation,
  ProgrammeTime,
  Schedule,
  ScheduleScope,
} from '../../domain/spi/ProgrammeInformation';
import { MalformedDocumentError } from '../../utils/errors';
import { XmlElement, children, firstChild, parseXml } from './XmlTree';

const NAME_ELEMENTS: Record<string, Name['kind']> = {
  shortName: 'short',
  mediumName: 'medium',
  longName: 'long',
};

const DESCRIPTION_ELEMENTS: Record<string, Description['kind']> = {
  shortDescription: 'short',
  longDescription: 'long',
};

/**
 * Maps SPI XML documents onto the domain model
 */
export class SpiXmlReader {
  public readServiceInformation(source: Buffer | string): ServiceInformation {
    const root = parseXml(source.toString());
    if (root.name !== 'serviceInformation') {
      throw new MalformedDocumentError(`Expected serviceInformation, found ${root.name}`);
    }

    const servicesElement = firstChild(root, 'services');
    if (!servicesElement) {
      throw new MalformedDocumentError('serviceInformation has no services element');
    }

    return {
      version: optionalInteger(root, 'version'),
      creationTime: optionalDate(root, 'creationTime'),
      originator: root.attributes.originator,
      serviceProvider: firstName(firstChild(servicesElement, 'serviceProvider')),
      services: children(servicesElement, 'service').map((element) => this.readService(element)),
    };
  }

  public readProgrammeInformation(source: Buffer | string): ProgrammeInformation {
    const root = parseXml(source.toString());
    if (root.name !== 'epg') {
      throw new MalformedDocumentError(`Expected epg, found ${root.name}`);
    }

    const schedules = children(root, 'schedule');
    if (schedules.length === 0) {
      throw new MalformedDocumentError('PI document has no schedule');
    }

    return {
      lang: root.attributes['xml:lang'],
      schedules: schedules.map((element) => this.readSchedule(element)),
    };
  }

  private readService(element: XmlElement): Service {
    const radiodns = firstChild(element, 'radiodns');
    return {
      names: readNames(element),
      descriptions: readDescriptions(element),
      genres: readGenres(element),
      media: readMedia(element),
      bearers: children(element, 'bearer').map((bearer) => this.readBearer(bearer)),
      links: readLinks(element),
      keywords: readKeywords(element),
      radiodns:
        radiodns && radiodns.attributes.fqdn
          ? {
              fqdn: radiodns.attributes.fqdn,
              serviceIdentifier: radiodns.attributes.serviceIdentifier ?? '',
            }
          : undefined,
    };
  }

  private readBearer(element: XmlElement): ServiceBearer {
    const uri = element.attributes.id;
    if (!uri) {
      throw new MalformedDocumentError('bearer without id');
    }
    return {
      uri,
      cost: optionalInteger(element, 'cost'),
      offset: optionalInteger(element, 'offset'),
      mimeValue: element.attributes.mimeValue,
      bitrate: optionalInteger(element, 'bitrate'),
    };
  }

  private readSchedule(element: XmlElement): Schedule {
    const scopeElement = firstChild(element, 'scope');
    let scope: ScheduleScope | undefined;
    if (scopeElement) {
      scope = {
        start: optionalDate(scopeElement, 'startTime') ?? null,
        end: optionalDate(scopeElement, 'stopTime') ?? null,
        serviceScopes: children(scopeElement, 'serviceScope')
          .map((entry) => entry.attributes.id)
          .filter((id): id is string => Boolean(id)),
      };
    }

    return {
      version: optionalInteger(element, 'version'),
      creationTime: optionalDate(element, 'creationTime'),
      originator: element.attributes.originator,
      scope,
      programmes: children(element, 'programme').map((entry) => this.readProgramme(entry)),
    };
  }

  private readProgramme(element: XmlElement): Programme {
    return {
      id: element.attributes.id,
      shortId: optionalInteger(element, 'shortId'),
      version: optionalInteger(element, 'version'),
      recommendation: element.attributes.recommendation === undefined ? undefined : element.attributes.recommendation === 'yes',
      names: readNames(element),
      descriptions: readDescriptions(element),
      media: readMedia(element),
      genres: readGenres(element),
      links: readLinks(element),
      keywords: readKeywords(element),
      locations: children(element, 'location').map((entry) => this.readLocation(entry)),
    };
  }

  private readLocation(element: XmlElement): Location {
    return {
      times: children(element, 'time').map((entry) => this.readTime(entry)),
      bearers: children(element, 'bearer')
        .map((entry) => entry.attributes.id)
        .filter((id): id is string => Boolean(id)),
    };
  }

  private readTime(element: XmlElement): ProgrammeTime {
    const time = optionalDate(element, 'time');
    const duration = optionalDuration(element, 'duration');
    if (!time || duration === undefined) {
      throw new MalformedDocumentError('time element needs time and duration');
    }
    return {
      time,
      duration,
      actualTime: optionalDate(element, 'actualTime'),
      actualDuration: optionalDuration(element, 'actualDuration'),
    };
  }
}

function lang(element: XmlElement): string | undefined {
  return element.attributes['xml:lang'];
}

function readNames(element: XmlElement): Name[] {
  return element.children
    .filter((entry) => Object.hasOwn(NAME_ELEMENTS, entry.name))
    .map((entry) => ({ kind: NAME_ELEMENTS[entry.name], text: entry.text, lang: lang(entry) }));
}

function firstName(element: XmlElement | undefined): string | undefined {
  return element ? readNames(element)[0]?.text : undefined;
}

// Descriptions and multimedia may sit directly on the element or inside mediaDescription
function mediaDescriptionChildren(element: XmlElement): XmlElement[] {
  return [
    ...element.children,
    ...children(element, 'mediaDescription').flatMap((entry) => entry.children),
  ];
}

function readDescriptions(element: XmlElement): Description[] {
  return mediaDescriptionChildren(element)
    .filter((entry) => Object.hasOwn(DESCRIPTION_ELEMENTS, entry.name))
    .map((entry) => ({ kind: DESCRIPTION_ELEMENTS[entry.name], text: entry.text, lang: lang(entry) }));
}

function readMedia(element: XmlElement): MediaItem[] {
  return mediaDescriptionChildren(element)
    .filter((entry) => entry.name === 'multimedia')
    .map((entry) => ({
      type: mediaType(entry.attributes.type),
      mimeType: entry.attributes.mimeValue,
      width: optionalInteger(entry, 'width'),
      height: optionalInteger(entry, 'height'),
      url: entry.attributes.url ?? '',
      lang: lang(entry),
    }));
}

function mediaType(value: string | undefined): MediaType | undefined {
  return MEDIA_TYPES.find((type) => type === value);
}

function readGenres(element: XmlElement): Genre[] {
  return children(element, 'genre').map((entry) => ({
    href: entry.attributes.href ?? '',
    name: entry.text || undefined,
    type: entry.attributes.type,
  }));
}

function readLinks(element: XmlElement): Link[] {
  return children(element, 'link')
    .filter((entry) => entry.attributes.uri)
    .map((entry) => ({
      uri: entry.attributes.uri,
      mimeValue: entry.attributes.mimeValue,
      description: entry.attributes.description,
      lang: lang(entry),
    }));
}

function readKeywords(element: XmlElement): string[] {
  return children(element, 'keywords')
    .flatMap((entry) => entry.text.split(','))
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword !== '');
}

function optionalInteger(element: XmlElement, attribute: string): number | undefined {
  const value = element.attributes[attribute];
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new MalformedDocumentError(`${element.name}@${attribute} is not an integer: ${value}`);
  }
  return parsed;
}

function optionalDate(element: XmlElement, attribute: string): Date | undefined {
  const value = element.attributes[attribute];
  if (value === undefined) {
    return undefined;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new MalformedDocumentError(`${element.name}@${attribute} is not a timestamp: ${value}`);
  }
  return parsed;
}

function optionalDuration(element: XmlElement, attribute: string): number | undefined {
  const value = element.attributes[attribute];
  if (value === undefined) {
    return undefined;
  }
  const duration = Duration.fromISO(value);
  if (!duration.isValid) {
    throw new MalformedDocumentError(`${element.name}@${attribute} is not a duration: ${value}`);
  }
  return duration.as('seconds');
}
