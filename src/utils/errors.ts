import type { AxiosResponse } from 'axios';

export class ConfigError extends Error {
  constructor(message: string, readonly variable: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CanvasApiError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string
  ) {
    super(`Canvas API returned ${status} for ${url}`);
    this.name = 'CanvasApiError';
  }

  static fromResponse(url: string, response: AxiosResponse): CanvasApiError {
    const data: unknown = response.data;
    const body = typeof data === 'string' ? data : JSON.stringify(data ?? '');
    return new CanvasApiError(response.status, url, body.slice(0, 200));
  }
}

/**
 * Raised when course selection ends up empty; the message is shown to the user as is.
 */
export class NoCoursesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoCoursesError';
  }
}
