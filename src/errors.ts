/** Base class for every error raised by the collector itself. */
export class TelemetryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The OTLP receiver could not start or could not decode a request. */
export class ReceiverError extends TelemetryError {}

/** A whole export request could not be normalized into envelopes. */
export class ProcessorError extends TelemetryError {}

export class StorageError extends TelemetryError {}

export class ConfigError extends TelemetryError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

export class ProviderError extends TelemetryError {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${message}`, options);
  }
}

export class ProviderInitializationError extends ProviderError {}

export class ProviderCollectionError extends ProviderError {}

export class ProviderAuthenticationError extends ProviderError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
