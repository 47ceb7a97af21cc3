import xml from 'xml';
import { Duration } from 'luxon';
import { Description, Genre, Link, MediaItem, Name } from '../../domain/spi/common';
import { Service } from '../../domain/spi/ServiceInformation';
import {
  Location,
  Programme,
  ProgrammeInformation,
  Schedule,
} from '../../domain/spi/ProgrammeInformation';
import { EnsembleIdentity } from '../../domain/discovery/DiscoveryResponse';

export const SPI_NAMESPACE = 'http://www.worlddab.org/schemas/spi';

type Attributes = Record<string, string | number | undefined>;

const NAME_TAGS: Record<Name['kind'], string> = {
  short: 'shortName',
  medium: 'mediumName',
  long: 'longName',
};

const DESCRIPTION_TAGS: Record<Description['kind'], string> = {
  short: 'shortDescription',
  long: 'longDescription',
};

function attrs(attributes: Attributes): xml.XmlAttrs {
  const result: xml.XmlAttrs = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function element(name: string, attributes: Attributes = {}, content: xml.XmlObject[] = []): xml.XmlObject {
  const present = attrs(attributes);
  const hasAttributes = Object.keys(present).length > 0;
  if (content.length === 0) {
    return { [name]: hasAttributes ? { _attr: present } : '' };
  }
  const body: Array<{ _attr: xml.XmlAttrs } | xml.XmlObject> = hasAttributes
    ? [{ _attr: present }, ...content]
    : content;
  return { [name]: body };
}

function textElement(name: string, text: string, attributes: Attributes = {}): xml.XmlObject {
  const present = attrs(attributes);
  return { [name]: Object.keys(present).length > 0 ? [{ _attr: present }, text] : text };
}

function formatDuration(seconds: number): string {
  return Duration.fromObject({ seconds }).shiftTo('hours', 'minutes', 'seconds').toISO() ?? 'PT0S';
}

/**
 * Serializes domain documents as SPI XML
 */
export class SpiXmlWriter {
  public writeServiceInformation(
    services: readonly Service[],
    ensemble: EnsembleIdentity,
    creationTime: Date = new Date()
  ): Buffer {
    const ensembleId = `${ensemble.ecc.toString(16).padStart(2, '0')}.${ensemble.eid.toString(16).padStart(4, '0')}`;
    const root = element(
      'serviceInformation',
      { xmlns: SPI_NAMESPACE, version: 1, creationTime: creationTime.toISOString() },
      [
        element('ensemble', { id: ensembleId }, [
          textElement('shortName', ensemble.shortName),
          textElement('longName', ensemble.longName),
        ]),
        element(
          'services',
          {},
          services.map((service) => this.service(service))
        ),
      ]
    );
    return Buffer.from(xml(root, { declaration: true }), 'utf-8');
  }

  public writeProgrammeInformation(document: ProgrammeInformation): Buffer {
    const root = element(
      'epg',
      { xmlns: SPI_NAMESPACE, 'xml:lang': document.lang },
      document.schedules.map((schedule) => this.schedule(schedule))
    );
    return Buffer.from(xml(root, { declaration: true }), 'utf-8');
  }

  private service(service: Service): xml.XmlObject {
    return element('service', {}, [
      ...names(service.names),
      ...mediaDescriptions(service.descriptions, service.media),
      ...genres(service.genres),
      ...keywords(service.keywords),
      ...links(service.links),
      ...service.bearers.map((bearer) =>
        element('bearer', {
          id: bearer.uri,
          cost: bearer.cost,
          offset: bearer.offset,
          mimeValue: bearer.mimeValue,
          bitrate: bearer.bitrate,
        })
      ),
      ...(service.radiodns
        ? [element('radiodns', { fqdn: service.radiodns.fqdn, serviceIdentifier: service.radiodns.serviceIdentifier })]
        : []),
    ]);
  }

  private schedule(schedule: Schedule): xml.XmlObject {
    const content: xml.XmlObject[] = [];
    if (schedule.scope) {
      content.push(
        element(
          'scope',
          {
            startTime: schedule.scope.start?.toISOString(),
            stopTime: schedule.scope.end?.toISOString(),
          },
          schedule.scope.serviceScopes.map((id) => element('serviceScope', { id }))
        )
      );
    }
    content.push(...schedule.programmes.map((programme) => this.programme(programme)));

    return element(
      'schedule',
      {
        version: schedule.version,
        creationTime: schedule.creationTime?.toISOString(),
        originator: schedule.originator,
      },
      content
    );
  }

  private programme(programme: Programme): xml.XmlObject {
    return element(
      'programme',
      {
        id: programme.id,
        shortId: programme.shortId,
        version: programme.version,
        recommendation: programme.recommendation === undefined ? undefined : programme.recommendation ? 'yes' : 'no',
      },
      [
        ...names(programme.names),
        ...programme.locations.map((location) => this.location(location)),
        ...mediaDescriptions(programme.descriptions, programme.media),
        ...genres(programme.genres),
        ...keywords(programme.keywords),
        ...links(programme.links),
      ]
    );
  }

  private location(location: Location): xml.XmlObject {
    return element('location', {}, [
      ...location.times.map((time) =>
        element('time', {
          time: time.time.toISOString(),
          duration: formatDuration(time.duration),
          actualTime: time.actualTime?.toISOString(),
          actualDuration: time.actualDuration !== undefined ? formatDuration(time.actualDuration) : undefined,
        })
      ),
      ...location.bearers.map((id) => element('bearer', { id })),
    ]);
  }
}

function names(entries: readonly Name[]): xml.XmlObject[] {
  return entries.map((name) => textElement(NAME_TAGS[name.kind], name.text, { 'xml:lang': name.lang }));
}

function mediaDescriptions(descriptions: readonly Description[], media: readonly MediaItem[]): xml.XmlObject[] {
  return [
    ...descriptions.map((description) =>
      element('mediaDescription', {}, [
        textElement(DESCRIPTION_TAGS[description.kind], description.text, { 'xml:lang': description.lang }),
      ])
    ),
    ...media.map((item) =>
      element('mediaDescription', {}, [
        element('multimedia', {
          type: item.type,
          mimeValue: item.mimeType,
          width: item.width,
          height: item.height,
          url: item.url,
          'xml:lang': item.lang,
        }),
      ])
    ),
  ];
}

function genres(entries: readonly Genre[]): xml.XmlObject[] {
  return entries.map((genre) =>
    genre.name
      ? textElement('genre', genre.name, { href: genre.href, type: genre.type })
      : element('genre', { href: genre.href, type: genre.type })
  );
}

function keywords(entries: readonly string[]): xml.XmlObject[] {
  return entries.length > 0 ? [textElement('keywords', entries.join(', '))] : [];
}

function links(entries: readonly Link[]): xml.XmlObject[] {
  return entries.map((link) =>
    element('link', {
      uri: link.uri,
      mimeValue: link.mimeValue,
      description: link.description,
      'xml:lang': link.lang,
    })
  );
}
