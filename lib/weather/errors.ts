export class WeatherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WeatherError";
  }
}

export class MissingApiKeyError extends WeatherError {
  constructor(message = "No API key present") {
    super(message);
    this.name = "MissingApiKeyError";
  }
}

export class WeatherTransportError extends WeatherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WeatherTransportError";
  }
}

/** The response arrived but its body could not be read to the end. */
export class WeatherBodyReadError extends WeatherTransportError {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WeatherBodyReadError";
    this.status = status;
  }
}

export type DecodeIssue = {
  path: string;
  message: string;
};

export class WeatherDecodeError extends WeatherError {
  readonly status: number | undefined;
  readonly issues: DecodeIssue[];

  constructor(
    message: string,
    details: { status?: number; issues?: DecodeIssue[]; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "WeatherDecodeError";
    this.status = details.status;
    this.issues = details.issues ?? [];
  }
}
