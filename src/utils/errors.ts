/**
 * Error types thrown by the fetch pipeline
 */

export class FetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid command-line input
 */
export class UsageError extends FetchError {}

export class MissingCredentialsError extends FetchError {
  constructor(
    readonly missing: string[],
    instructionsUrl: string,
  ) {
    super(
      `Missing a required authentication file: ${missing.join(", ")}\n` +
        `See instructions here:\n    ${instructionsUrl}`,
    );
  }
}

export class FolderNotFoundError extends FetchError {}

/**
 * A file the run requires is absent (or empty) after fetching
 */
export class IncompleteFetchError extends FetchError {
  constructor(readonly path: string) {
    super(`Missing required file: ${path}`);
  }
}

export class InvalidImageError extends FetchError {
  constructor(readonly path: string) {
    super(
      `Found an invalid image, it has been wiped. Please rerun fetching: ${path}`,
    );
  }
}

export class FrameNumberError extends FetchError {
  constructor(readonly filename: string) {
    super(`Could not parse a frame number from: ${filename}`);
  }
}

export class HttpError extends FetchError {
  constructor(
    readonly status: number,
    statusText: string,
    readonly url: string,
  ) {
    super(`HTTP ${status}: ${statusText} (${url})`);
  }
}
