export class PulseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PulseError {}

export class TransportError extends PulseError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`GitHub GraphQL request failed: HTTP ${status}${body ? ` ${body}` : ""}`);
    this.status = status;
    this.body = body;
  }
}

export interface UpstreamErrorEntry {
  message: string;
  type?: string;
  path?: Array<string | number>;
}

export class UpstreamError extends PulseError {
  readonly errors: UpstreamErrorEntry[];

  constructor(errors: UpstreamErrorEntry[]) {
    const summary = errors.map((entry) => entry.message).join("; ");
    super(`GitHub GraphQL returned errors: ${summary || "(no message)"}`);
    this.errors = errors;
  }
}

export class DataShapeError extends PulseError {
  readonly document: string;

  constructor(document: string, detail: string) {
    super(`Unexpected response shape for ${document}: ${detail}`);
    this.document = document;
  }
}

export type WindowErrorCode =
  | "INVALID_DATE_FORMAT"
  | "INVALID_TIMEZONE"
  | "INVALID_DATE_RANGE"
  | "FUTURE_DATE"
  | "DATE_RANGE_TOO_LARGE";

export class WindowError extends PulseError {
  readonly code: WindowErrorCode;

  constructor(code: WindowErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}
