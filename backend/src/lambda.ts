/**
 * AWS Lambda handler for the RAG API
 *
 * The same function sits behind a Lambda Function URL and an API Gateway HTTP
 * API. Services are initialized on the first invocation rather than at module
 * load, which keeps cold starts inside Lambda's init timeout.
 */

import { createApp } from './app.js';
import { createRequestAdapter } from './adapters/lambdaAdapter.js';
import { ensureScratchDirectories } from './bootstrap/scratchDirectories.js';
import { env } from './config/env.js';
import { API_GATEWAY_BASE_PATH } from './runtime/constants.js';
import { createDispatchRouter } from './runtime/dispatchRouter.js';
import { createLambdaHandler } from './runtime/entryPoint.js';
import { InitializationGate } from './runtime/initializationGate.js';
import { initializeServices } from './services/index.js';

// Services read and write under the scratch directory, so it has to exist first
ensureScratchDirectories(env.SCRATCH_DIR);

const app = createApp({ lambda: true });

const router = createDispatchRouter({
  'function-url': createRequestAdapter(app, ''),
  'api-gateway': createRequestAdapter(app, API_GATEWAY_BASE_PATH),
});

const gate = new InitializationGate(() => initializeServices(env.SCRATCH_DIR));

export const handler = createLambdaHandler({ gate, router });
