/**
 * Shared SPI element types (names, descriptions, media, genres, links)
 */

export type NameKind = 'short' | 'medium' | 'long';

export interface Name {
  kind: NameKind;
  text: string;
  lang?: string;
}

export type DescriptionKind = 'short' | 'long';

export interface Description {
  kind: DescriptionKind;
  text: string;
  lang?: string;
}

export type MediaType = 'logo_colour_square' | 'logo_colour_rectangle' | 'logo_unrestricted';

export const MEDIA_TYPES: readonly MediaType[] = [
  'logo_colour_square',
  'logo_colour_rectangle',
  'logo_unrestricted',
];

export interface MediaItem {
  type?: MediaType;
  mimeType?: string;
  width?: number;
  height?: number;
  url: string;
  lang?: string;
}

export interface Genre {
  href: string;
  name?: string;
  type?: string; // main | secondary | other
}

export interface Link {
  uri: string;
  mimeValue?: string;
  description?: string;
  lang?: string;
}

export function findName(names: readonly Name[], kind: NameKind): string | undefined {
  return names.find((name) => name.kind === kind)?.text;
}
