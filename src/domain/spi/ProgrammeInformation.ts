import { Description, Genre, Link, MediaItem, Name } from './common';

/**
 * Validity window of a schedule. Either bound may be unresolved.
 */
export interface Scope {
  start: Date | null;
  end: Date | null;
}

export interface ScheduleScope extends Scope {
  serviceScopes: string[];
}

export interface ProgrammeTime {
  time: Date;
  duration: number; // seconds
  actualTime?: Date;
  actualDuration?: number; // seconds
}

export interface Location {
  times: ProgrammeTime[];
  bearers: string[];
}

export interface Programme {
  id?: string;
  shortId?: number;
  version?: number;
  recommendation?: boolean;
  names: Name[];
  descriptions: Description[];
  media: MediaItem[];
  genres: Genre[];
  links: Link[];
  keywords: string[];
  locations: Location[];
}

export interface Schedule {
  version?: number;
  creationTime?: Date;
  originator?: string;
  scope?: ScheduleScope;
  programmes: Programme[];
}

export interface ProgrammeInformation {
  lang?: string;
  schedules: Schedule[];
}

/**
 * Broadcast start of a time entry (actual time when known)
 */
export function effectiveStart(entry: ProgrammeTime): Date {
  return entry.actualTime ?? entry.time;
}

/**
 * Broadcast end of a time entry (actual start + actual duration when known)
 */
export function effectiveEnd(entry: ProgrammeTime): Date {
  const duration = entry.actualDuration ?? entry.duration;
  return new Date(effectiveStart(entry).getTime() + duration * 1000);
}
