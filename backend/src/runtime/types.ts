import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';

/**
 * Payload handed to the Lambda entry point. Function URLs and HTTP APIs both
 * send the v2 shape, but nothing beyond `requestContext.stage` is relied on.
 */
export type InvocationEvent = APIGatewayProxyEventV2 | Record<string, unknown>;

/** Which front door produced an invocation. */
export type OriginKind = 'function-url' | 'api-gateway';

export type SetupProcedure = () => Promise<void> | void;

export type RequestAdapter<TResult> = (event: InvocationEvent, context: Context) => Promise<TResult>;

export type LambdaHandler<TResult> = (event: InvocationEvent, context: Context) => Promise<TResult>;
