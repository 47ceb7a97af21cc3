import { Multiplex } from '../../domain/discovery/DiscoveryResponse';
import { CredentialStore } from '../fetch/CredentialStore';

/**
 * first-success: stop at the first server returning services for the bearers.
 * union: ask every server and keep everything they return.
 */
export type SourcePolicy = 'first-success' | 'union';

/**
 * State shared by one run of the pipeline
 */
export interface RunContext {
  now: Date;
  days: number;
  multiplex: Multiplex;
  credentials: CredentialStore;
  sourcePolicy: SourcePolicy;
  /** Bearer URIs whose PI has already been requested in this run */
  scheduledBearers: Set<string>;
  /** Logo name stems already handed out to a service */
  logoStems: Set<string>;
}

export function createRunContext(
  params: Omit<RunContext, 'scheduledBearers' | 'logoStems'> &
    Partial<Pick<RunContext, 'scheduledBearers' | 'logoStems'>>
): RunContext {
  return {
    ...params,
    scheduledBearers: params.scheduledBearers ?? new Set(),
    logoStems: params.logoStems ?? new Set(),
  };
}
