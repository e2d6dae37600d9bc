import { classifyEvent } from './classifyEvent.js';
import type { DispatchRouter } from './dispatchRouter.js';
import type { InitializationGate } from './initializationGate.js';
import type { LambdaHandler } from './types.js';

export interface LambdaHandlerOptions<TResult> {
  gate: InitializationGate;
  router: DispatchRouter<TResult>;
}

/**
 * Build the function Lambda invokes: make sure services are up, work out which
 * front door the event came through, and hand it to that door's adapter.
 */
export function createLambdaHandler<TResult>({ gate, router }: LambdaHandlerOptions<TResult>): LambdaHandler<TResult> {
  return async (event, context) => {
    await gate.ensureInitialized();
    const origin = classifyEvent(event);
    return router.dispatch(origin, event, context);
  };
}
