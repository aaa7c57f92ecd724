export type ProviderName = 'search' | 'generate';

/** Retryable: timeouts, network faults, 408/429/5xx. Terminal: auth, bad request, missing credentials. */
export type ProviderFailureClass = 'retryable' | 'terminal';

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly failureClass: ProviderFailureClass,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function classifyHttpStatus(status: number): ProviderFailureClass {
  if (status === 408 || status === 429 || status >= 500) return 'retryable';
  return 'terminal';
}

export function classifyProviderError(err: unknown): ProviderFailureClass {
  if (err instanceof ProviderError) return err.failureClass;
  // Anything unclassified (fetch TypeError, abort, socket reset) is treated as transient.
  return 'retryable';
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
