import { InitializationError } from './errors.js';
import type { SetupProcedure } from './types.js';

export type GateState = 'uninitialized' | 'initializing' | 'ready';

/**
 * Runs a setup procedure once per process, on first use.
 *
 * Callers that arrive while setup is running share the same attempt. A failed
 * attempt leaves the gate uninitialized, so the following call starts over.
 */
export class InitializationGate {
  private state: GateState = 'uninitialized';
  private inFlight: Promise<void> | null = null;

  constructor(private readonly setup: SetupProcedure) {}

  get status(): GateState {
    return this.state;
  }

  get initialized(): boolean {
    return this.state === 'ready';
  }

  ensureInitialized(): Promise<void> {
    if (this.state === 'ready') {
      return Promise.resolve();
    }

    if (!this.inFlight) {
      this.inFlight = this.runSetup().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runSetup(): Promise<void> {
    this.state = 'initializing';
    const startedAt = Date.now();
    console.log('First invocation, initializing services...');

    try {
      await this.setup();
    } catch (error) {
      this.state = 'uninitialized';
      const message = error instanceof Error ? error.message : String(error);
      console.error('Service initialization failed:', message);
      throw new InitializationError(`Service initialization failed: ${message}`, { cause: error });
    }

    this.state = 'ready';
    console.log(`Services initialized in ${Date.now() - startedAt}ms`);
  }
}
