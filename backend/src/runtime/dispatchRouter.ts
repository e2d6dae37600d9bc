import type { Context } from 'aws-lambda';
import type { InvocationEvent, OriginKind, RequestAdapter } from './types.js';

export type AdapterBindings<TResult> = Readonly<Record<OriginKind, RequestAdapter<TResult>>>;

export interface DispatchRouter<TResult> {
  dispatch(origin: OriginKind, event: InvocationEvent, context: Context): Promise<TResult>;
}

export function createDispatchRouter<TResult>(adapters: AdapterBindings<TResult>): DispatchRouter<TResult> {
  const bindings: AdapterBindings<TResult> = Object.freeze({
    'function-url': adapters['function-url'],
    'api-gateway': adapters['api-gateway'],
  });

  return {
    dispatch(origin, event, context) {
      return bindings[origin](event, context);
    },
  };
}
