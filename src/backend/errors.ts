/**
 * Thrown when `parse` receives something that is not a cheerio document.
 */
export class InvalidDocumentError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDocumentError';
  }
}

/**
 * Non-2xx HTTP response.
 */
export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText = '',
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

/** Invalid value in the environment configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
