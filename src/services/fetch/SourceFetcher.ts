import { Bearer } from '../../domain/bearer/Bearer';
import { CandidateServer } from '../../domain/discovery/DiscoveryResponse';
import { Service, isCarriedOn } from '../../domain/spi/ServiceInformation';
import { ProgrammeInformation } from '../../domain/spi/ProgrammeInformation';
import { SpiXmlReader } from '../../infrastructure/spi/SpiXmlReader';
import { config } from '../../config/env';
import { AppError, MalformedDocumentError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('SourceFetcher');

export type FailureReason = 'authorization' | 'transport' | 'malformed';

/**
 * Result of fetching one document from one source
 */
export type FetchOutcome<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found'; url: string }
  | { status: 'failed'; reason: FailureReason; url: string; error: Error };

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface SourceFetcherOptions {
  fetch?: FetchFn;
  reader?: SpiXmlReader;
  timeoutMs?: number;
  userAgent?: string;
}

export class TransportError extends AppError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'TRANSPORT_ERROR');
  }
}

const AUTHORIZATION_STATUSES = new Set([401, 403, 500]);

/**
 * Order candidate servers: lower priority first, then higher weight
 */
export function orderCandidates(candidates: readonly CandidateServer[]): CandidateServer[] {
  return [...candidates].sort((a, b) => a.priority - b.priority || b.weight - a.weight);
}

/**
 * Retrieves SPI documents and logo images. Every call is a single attempt;
 * recovery (trying the next server or day) belongs to the caller.
 */
export class SourceFetcher {
  private readonly fetchFn: FetchFn;
  private readonly reader: SpiXmlReader;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: SourceFetcherOptions = {}) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.reader = options.reader ?? new SpiXmlReader();
    this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
    this.userAgent = options.userAgent ?? config.http.userAgent;
  }

  /**
   * Fetch an SI document and keep the services carried on any of `bearers`.
   * An empty intersection is still "found" with zero services.
   */
  public async fetchServiceInformation(
    url: string,
    bearers: readonly Bearer[],
    credential?: string
  ): Promise<FetchOutcome<Service[]>> {
    const outcome = await this.fetchBinary(url, credential);
    if (outcome.status !== 'found') {
      return outcome;
    }

    try {
      const document = this.reader.readServiceInformation(outcome.value);
      const services = document.services.filter((service) => isCarriedOn(service, bearers));
      logger.debug(
        { url, published: document.services.length, matching: services.length },
        'Parsed service information'
      );
      return { status: 'found', value: services };
    } catch (error) {
      return this.malformed(url, error);
    }
  }

  public async fetchProgrammeInformation(
    url: string,
    credential?: string
  ): Promise<FetchOutcome<ProgrammeInformation>> {
    const outcome = await this.fetchBinary(url, credential);
    if (outcome.status !== 'found') {
      return outcome;
    }

    try {
      return { status: 'found', value: this.reader.readProgrammeInformation(outcome.value) };
    } catch (error) {
      return this.malformed(url, error);
    }
  }

  public async fetchBinary(url: string, credential?: string): Promise<FetchOutcome<Buffer>> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    if (credential) {
      headers['Authorization'] = credential;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ url, error: err.message }, 'Request failed');
      return { status: 'failed', reason: 'transport', url, error: new TransportError(err.message) };
    }

    if (response.status === 404) {
      logger.debug({ url }, 'Document not found');
      return { status: 'not-found', url };
    }

    if (!response.ok) {
      const reason: FailureReason = AUTHORIZATION_STATUSES.has(response.status) ? 'authorization' : 'transport';
      logger.warn({ url, status: response.status, authorized: Boolean(credential) }, `Request rejected (${reason})`);
      return {
        status: 'failed',
        reason,
        url,
        error: new TransportError(`HTTP ${response.status} for ${url}`, response.status),
      };
    }

    try {
      return { status: 'found', value: Buffer.from(await response.arrayBuffer()) };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ url, error: err.message }, 'Failed to read response body');
      return { status: 'failed', reason: 'transport', url, error: new TransportError(err.message) };
    }
  }

  private malformed<T>(url: string, error: unknown): FetchOutcome<T> {
    const err =
      error instanceof MalformedDocumentError
        ? error
        : new MalformedDocumentError(error instanceof Error ? error.message : String(error), url);
    logger.warn({ url, error: err.message }, 'Malformed document');
    return { status: 'failed', reason: 'malformed', url, error: err };
  }
}
