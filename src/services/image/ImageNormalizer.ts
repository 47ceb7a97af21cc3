import { AssembledObject, ContentTypes } from '../../domain/carousel/AssembledObject';
import { MediaItem, MediaType, findName } from '../../domain/spi/common';
import { Service } from '../../domain/spi/ServiceInformation';
import { ImageDimensions, ImageRecompressor } from '../../infrastructure/ffmpeg/ImageRecompressor';
import { CredentialStore } from '../fetch/CredentialStore';
import { SourceFetcher } from '../fetch/SourceFetcher';
import { config } from '../../config/env';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ImageNormalizer');

/** Logo sizes accepted from untyped PNG media */
export const ACCEPTED_DIMENSIONS: readonly ImageDimensions[] = [
  { width: 32, height: 32 },
  { width: 112, height: 32 },
  { width: 128, height: 128 },
  { width: 320, height: 240 },
  { width: 600, height: 600 },
];

const CANONICAL_DIMENSIONS: Partial<Record<MediaType, ImageDimensions>> = {
  logo_colour_square: { width: 32, height: 32 },
  logo_colour_rectangle: { width: 112, height: 32 },
};

const MAX_NAME_LENGTH = 8;

export type LogoRecompressor = Pick<ImageRecompressor, 'recompress' | 'dimensions'>;

export interface ImageNormalizerOptions {
  fetcher: SourceFetcher;
  recompressor?: LogoRecompressor;
  maxBytes?: number;
}

export interface NormalizedLogos {
  service: Service;
  objects: AssembledObject[];
}

interface AcceptedLogo {
  name: string;
  index: number;
  source: MediaItem;
  dimensions: ImageDimensions;
}

/**
 * Classification by final pixel size
 */
export function classify(dimensions: ImageDimensions): MediaType {
  if (dimensions.width === 32 && dimensions.height === 32) {
    return 'logo_colour_square';
  }
  if (dimensions.width === 112 && dimensions.height === 32) {
    return 'logo_colour_rectangle';
  }
  return 'logo_unrestricted';
}

/**
 * Dimensions an item is published with, or null when it is not an acceptable logo.
 * Square and rectangle logos are forced to their canonical size.
 */
export function acceptedDimensions(item: MediaItem): ImageDimensions | null {
  const canonical = item.type ? CANONICAL_DIMENSIONS[item.type] : undefined;
  if (!item.url.trim()) {
    return null;
  }
  if (canonical) {
    return canonical;
  }
  if (item.mimeType === 'image/png' && item.width !== undefined && item.height !== undefined) {
    const match = ACCEPTED_DIMENSIONS.find(
      (dimensions) => dimensions.width === item.width && dimensions.height === item.height
    );
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Logo object name stem: the service's short display name, length-limited,
 * with everything outside [A-Za-z0-9_-] replaced by `_`
 */
export function logoBaseName(service: Service): string {
  const name =
    findName(service.names, 'short') ?? findName(service.names, 'medium') ?? findName(service.names, 'long') ?? 'service';
  const stem = name.trim().slice(0, MAX_NAME_LENGTH).replace(/[^A-Za-z0-9_-]/g, '_');
  return /^_*$/.test(stem) ? 'service' : stem;
}

/**
 * First free stem for `base` in this run: `base`, then `base-2`, `base-3`, ...
 */
export function claimLogoStem(base: string, claimed: Set<string>): string {
  let stem = base;
  for (let suffix = 2; claimed.has(stem); suffix++) {
    stem = `${base}-${suffix}`;
  }
  claimed.add(stem);
  return stem;
}

export function logoName(stem: string, index: number, dimensions: ImageDimensions): string {
  return `${stem}_${index}_${dimensions.width}x${dimensions.height}.png`;
}

/**
 * Produces the packaged logo set of a service. The returned service carries
 * only the logos that made it into the carousel, each pointing at its object name.
 * Services sharing `claimedStems` never share a logo name.
 */
export class ImageNormalizer {
  private readonly fetcher: SourceFetcher;
  private readonly recompressor: LogoRecompressor;
  private readonly maxBytes: number;

  constructor(options: ImageNormalizerOptions) {
    this.fetcher = options.fetcher;
    this.recompressor = options.recompressor ?? new ImageRecompressor();
    this.maxBytes = options.maxBytes ?? config.logos.maxBytes;
  }

  public async normalize(
    service: Service,
    documentUrl: string,
    credentials: CredentialStore,
    claimedStems: Set<string> = new Set()
  ): Promise<NormalizedLogos> {
    const candidates = service.media.flatMap((source) => {
      const dimensions = acceptedDimensions(source);
      return dimensions ? [{ source, dimensions }] : [];
    });
    const stem = candidates.length > 0 ? claimLogoStem(logoBaseName(service), claimedStems) : logoBaseName(service);
    // Names are fixed before fetching so they do not depend on fetch order
    const accepted: AcceptedLogo[] = candidates.map((candidate, index) => ({
      ...candidate,
      index,
      name: logoName(stem, index, candidate.dimensions),
    }));

    const results = await Promise.all(accepted.map((logo) => this.packageLogo(logo, documentUrl, credentials)));

    const media: MediaItem[] = [];
    const objects: AssembledObject[] = [];
    for (const result of results) {
      if (result) {
        media.push(result.item);
        objects.push(result.object);
      }
    }

    logger.debug(
      { service: stem, offered: service.media.length, accepted: accepted.length, packaged: objects.length },
      'Normalized logos'
    );

    return { service: { ...service, media }, objects };
  }

  private async packageLogo(
    logo: AcceptedLogo,
    documentUrl: string,
    credentials: CredentialStore
  ): Promise<{ item: MediaItem; object: AssembledObject } | null> {
    const { name } = logo;

    let url: string;
    try {
      url = new URL(logo.source.url, documentUrl).toString();
    } catch (error) {
      logger.warn({ name, url: logo.source.url, error }, 'Logo has an invalid URL');
      return null;
    }

    const outcome = await this.fetcher.fetchBinary(url, credentials.lookupUrl(url));
    if (outcome.status !== 'found') {
      logger.warn({ name, url, status: outcome.status }, 'Logo could not be fetched; leaving it out');
      return null;
    }

    let body = outcome.value;
    if (body.length > this.maxBytes) {
      try {
        body = await this.shrink(body, name);
      } catch (error) {
        logger.warn({ name, url, error }, 'Logo recompression failed; leaving it out');
        return null;
      }
    }

    return {
      item: {
        ...logo.source,
        type: classify(logo.dimensions),
        mimeType: 'image/png',
        width: logo.dimensions.width,
        height: logo.dimensions.height,
        url: name,
      },
      object: { name, body, contentType: ContentTypes.png, parameters: [] },
    };
  }

  /**
   * Palette recompression, kept only when it is smaller and the picture size is unchanged
   */
  private async shrink(original: Buffer, name: string): Promise<Buffer> {
    const { data, dimensions } = await this.recompressor.recompress(original, name);
    if (data.length >= original.length) {
      logger.debug({ name, originalBytes: original.length, recompressedBytes: data.length }, 'Recompression did not help');
      return original;
    }

    const originalDimensions = await this.recompressor.dimensions(original);
    if (originalDimensions.width !== dimensions.width || originalDimensions.height !== dimensions.height) {
      logger.warn({ name, originalDimensions, dimensions }, 'Recompression changed the image size; keeping original');
      return original;
    }

    logger.info({ name, originalBytes: original.length, recompressedBytes: data.length }, 'Recompressed oversized logo');
    return data;
  }
}
