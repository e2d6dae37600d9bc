/**
 * serverless-http wrapper for the Express app.
 *
 * API Gateway prefixes every path with its stage name while Function URLs don't,
 * so each front door gets its own handler instance with its own base path.
 */

import type { IncomingMessage } from 'http';
import type { Application } from 'express';
import serverless from 'serverless-http';
import type { InvocationEvent, RequestAdapter } from '../runtime/types.js';
import '../types/http.js';

type ServerlessHandler = ReturnType<typeof serverless>;

export type LambdaResponse = Awaited<ReturnType<ServerlessHandler>>;

// v2 payloads carry `rawPath`, v1 payloads `path`
const PATH_FIELDS = ['rawPath', 'path'] as const;

/** Drop `basePath` from the start of `path`; a match elsewhere in the path is left alone. */
export function removeBasePath(path: string, basePath: string): string {
  if (!basePath) return path;
  if (path !== basePath && !path.startsWith(`${basePath}/`)) return path;
  return path.slice(basePath.length) || '/';
}

// serverless-http normalises the event in place, so it only ever sees a copy
function prepareEvent(event: InvocationEvent, basePath: string): InvocationEvent {
  const copy: Record<string, unknown> = { ...structuredClone(event) };

  for (const field of PATH_FIELDS) {
    const value = copy[field];
    if (typeof value === 'string') {
      copy[field] = removeBasePath(value, basePath);
    }
  }

  return copy;
}

/**
 * `basePath` is stripped from the start of incoming paths and exposed to the
 * app as `req.rootPath`. Pass an empty string for no prefix.
 */
export function createRequestAdapter(app: Application, basePath: string): RequestAdapter<LambdaResponse> {
  // serverless-http's own `basePath` option matches anywhere in the path, so the prefix is removed here instead
  const proxy = serverless(app, {
    request: (request: IncomingMessage) => {
      request.rootPath = basePath;
    },
  });

  return (event, context) => proxy(prepareEvent(event, basePath), context);
}
