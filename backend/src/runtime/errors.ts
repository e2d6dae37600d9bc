/**
 * Service setup failed. The original failure is kept as `cause`; the gate that
 * raised it stays uninitialized so the next invocation retries.
 */
export class InitializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InitializationError';
  }
}

/** Scratch directories could not be prepared. */
export class BootstrapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BootstrapError';
  }
}
