import { Bearer } from '../../domain/bearer/Bearer';
import {
  Programme,
  ProgrammeInformation,
  Schedule,
  Scope,
  effectiveEnd,
  effectiveStart,
} from '../../domain/spi/ProgrammeInformation';

export const SHORT_DESCRIPTION_LIMIT = 180;

function earlier(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() <= b.getTime() ? a : b;
}

function later(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * Validity window of one schedule. Declared bounds win; missing bounds come
 * from the earliest start and latest end of the programme times.
 */
export function scheduleScope(schedule: Schedule): Scope {
  const declaredStart = schedule.scope?.start ?? null;
  const declaredEnd = schedule.scope?.end ?? null;
  if (declaredStart && declaredEnd) {
    return { start: declaredStart, end: declaredEnd };
  }

  let start: Date | null = null;
  let end: Date | null = null;
  for (const programme of schedule.programmes) {
    for (const location of programme.locations) {
      for (const time of location.times) {
        start = earlier(start, effectiveStart(time));
        end = later(end, effectiveEnd(time));
      }
    }
  }

  return { start: declaredStart ?? start, end: declaredEnd ?? end };
}

/**
 * Aggregate window across all schedules of a document: earliest start, latest end.
 * A bound that any schedule leaves unresolved is null for the whole document.
 */
export function documentScope(document: ProgrammeInformation): Scope {
  let start: Date | null = null;
  let end: Date | null = null;
  let startResolved = document.schedules.length > 0;
  let endResolved = document.schedules.length > 0;
  for (const schedule of document.schedules) {
    const scope = scheduleScope(schedule);
    startResolved = startResolved && scope.start !== null;
    endResolved = endResolved && scope.end !== null;
    start = earlier(start, scope.start);
    end = later(end, scope.end);
  }
  return { start: startResolved ? start : null, end: endResolved ? end : null };
}

/**
 * Replace every schedule's scope with `scope`, restricted to the one bearer
 * being published. Any multi-bearer scope from the source is discarded.
 */
export function applyScope(document: ProgrammeInformation, scope: Scope, bearer: Bearer): ProgrammeInformation {
  return {
    ...document,
    schedules: document.schedules.map((schedule) => ({
      ...schedule,
      scope: { start: scope.start, end: scope.end, serviceScopes: [bearer.uri] },
    })),
  };
}

function backfillProgramme(programme: Programme): Programme {
  if (programme.descriptions.some((description) => description.kind === 'short')) {
    return programme;
  }
  const source = programme.descriptions.find(
    (description) => description.kind === 'long' && description.text.length <= SHORT_DESCRIPTION_LIMIT
  );
  if (!source) {
    return programme;
  }
  return {
    ...programme,
    descriptions: [...programme.descriptions, { ...source, kind: 'short' }],
  };
}

/**
 * Give programmes without a short description one copied from a long description
 * that fits the short-description limit. Existing descriptions are kept as they are.
 */
export function backfillShortDescriptions(document: ProgrammeInformation): ProgrammeInformation {
  return {
    ...document,
    schedules: document.schedules.map((schedule) => ({
      ...schedule,
      programmes: schedule.programmes.map(backfillProgramme),
    })),
  };
}
