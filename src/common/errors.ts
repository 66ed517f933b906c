/**
 * Failures the CLI knows how to report. Anything else reaching the entry
 * point is printed as an unexpected fatal error.
 */
export abstract class ScraperError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidApiKeyError extends ScraperError {
  readonly exitCode = 1;

  constructor(detail?: string) {
    super(
      detail
        ? `YouTube API key was rejected: ${detail}`
        : 'YOUTUBE_API_KEY is not set. ' +
          'Add it to your environment or .env file.',
    );
  }
}

export class ChannelNotFoundError extends ScraperError {
  readonly exitCode = 1;

  constructor(readonly identifier: string) {
    super(
      `Channel not found: ${identifier || '(empty)'}. ` +
        `Run "find-channel ${identifier || '<name>'}" ` +
        'to look up its channel ID.',
    );
  }
}

export class RateLimitedError extends ScraperError {
  readonly exitCode = 1;

  constructor(
    readonly endpoint: string,
    readonly status: number,
  ) {
    super(`Rate limited by YouTube on ${endpoint} (HTTP ${status})`);
  }
}

export class QuotaExceededError extends ScraperError {
  readonly exitCode = 1;

  constructor(
    readonly endpoint: string,
    reason: string,
  ) {
    super(`YouTube API quota exhausted on ${endpoint}: ${reason}`);
  }
}

export class NetworkError extends ScraperError {
  readonly exitCode = 1;

  constructor(
    readonly endpoint: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(
      status
        ? `Request to ${endpoint} failed with HTTP ${status}: ${message}`
        : `Request to ${endpoint} failed: ${message}`,
      options,
    );
  }
}

export class ConfigurationError extends ScraperError {
  readonly exitCode = 2;
}
