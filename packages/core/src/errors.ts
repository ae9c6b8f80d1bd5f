/** Base class for every failure the pipeline reports. */
export class PipeAskError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Config file missing, unreadable, malformed or incomplete. */
export class ConfigError extends PipeAskError {}

/** No input given, or conflicting output format flags. */
export class UsageError extends PipeAskError {}

/** The API answered with a status other than 200. */
export class APIError extends PipeAskError {
  public readonly status: number;
  public readonly body: string;

  public constructor(status: number, body: string) {
    super(`API request failed with status code ${status}: ${body}`);
    this.status = status;
    this.body = body;
  }
}

/** The response body could not be read as a completion. */
export class ParseError extends PipeAskError {}

export class NoChoicesError extends PipeAskError {
  public constructor() {
    super('no response choices returned');
  }
}

/** The request never produced an HTTP response. */
export class TransportError extends PipeAskError {}

/** The `--log` transcript could not be opened or written. */
export class TranscriptError extends PipeAskError {}

/** Render an unknown thrown value as a single line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
