/**
 * Failure taxonomy shared by every stage. A blocked page is tracked as session state, but a source
 * that runs into one still reports `blocked` as the reason it missed.
 */
export type FailureKind =
  | 'transient_network'
  | 'blocked'
  | 'not_found'
  | 'validation_failure'
  | 'timeout'
  | 'configuration_missing';

export class HarvestError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'HarvestError';
  }
}

export class AcquisitionError extends HarvestError {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'AcquisitionError';
  }
}

export class ProviderError extends HarvestError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ProviderError';
  }

  /** Whether the provider refused the request rather than failing to serve it. */
  get blocked(): boolean {
    return this.status === 401 || this.status === 403 || this.status === 429;
  }
}

export class ConversionError extends HarvestError {
  constructor(
    message: string,
    public readonly backend: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ConversionError';
  }
}

export class ConfigurationMissingError extends HarvestError {
  constructor(public readonly setting: string, message?: string) {
    super(message ?? `Missing configuration: ${setting}`, { setting });
    this.name = 'ConfigurationMissingError';
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');

/**
 * Maps an arbitrary thrown value onto the taxonomy. Provider 404s are "not found", aborted
 * requests are timeouts, anything else from the network layer is transient.
 */
export const classifyFailure = (error: unknown): FailureKind => {
  if (error instanceof AcquisitionError) {
    return error.kind;
  }

  if (error instanceof ConfigurationMissingError) {
    return 'configuration_missing';
  }

  if (error instanceof ProviderError) {
    if (error.blocked) {
      return 'blocked';
    }
    if (error.status === 404 || error.status === 410) {
      return 'not_found';
    }
    return 'transient_network';
  }

  if (isAbortError(error)) {
    return 'timeout';
  }

  return 'transient_network';
};
