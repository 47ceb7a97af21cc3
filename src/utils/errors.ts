/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * SI/PI payload that does not have the expected structure
 */
export class MalformedDocumentError extends AppError {
  constructor(message: string, public readonly url?: string) {
    super(message, 'MALFORMED_DOCUMENT');
  }
}

/**
 * Nothing was discovered for the multiplex; the run produces no output
 */
export class NoServicesFoundError extends AppError {
  constructor(message: string = 'No services found for multiplex') {
    super(message, 'NO_SERVICES_FOUND', false);
  }
}

/**
 * Multiplex configuration file could not be understood
 */
export class MuxConfigError extends AppError {
  constructor(message: string, public readonly line?: number) {
    super(line !== undefined ? `${message} (line ${line})` : message, 'MUX_CONFIG_ERROR', false);
  }
}

/**
 * FFmpeg error
 */
export class FFmpegError extends AppError {
  constructor(message: string) {
    super(message, 'FFMPEG_ERROR');
  }
}

/**
 * Value does not fit the binary field it is written to
 */
export class EncodingError extends AppError {
  constructor(message: string) {
    super(message, 'ENCODING_ERROR', false);
  }
}

/**
 * Configuration error (non-operational, should exit)
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
  }
}
