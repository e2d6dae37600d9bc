import { z } from 'zod';
import { FUNCTION_URL_STAGE } from './constants.js';
import type { InvocationEvent, OriginKind } from './types.js';

const stagedEventSchema = z.object({
  requestContext: z.object({
    stage: z.string(),
  }),
});

// Anything without a string stage counts as no stage at all
function resolveStage(event: InvocationEvent): string {
  const result = stagedEventSchema.safeParse(event);
  return result.success ? result.data.requestContext.stage : '';
}

/**
 * Function URLs report the `$default` stage (or none). API Gateway reports the
 * stage it was deployed to, which is always a custom name such as `prod`.
 */
export function classifyEvent(event: InvocationEvent): OriginKind {
  const stage = resolveStage(event);
  if (stage === '' || stage === FUNCTION_URL_STAGE) {
    return 'function-url';
  }
  return 'api-gateway';
}
