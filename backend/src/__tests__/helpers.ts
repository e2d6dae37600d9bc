import type { Context } from 'aws-lambda';

export function createContext(overrides: Partial<Context> = {}): Context {
  return {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'rag-api',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:000000000000:function:rag-api',
    memoryLimitInMB: '1024',
    awsRequestId: 'request-1',
    logGroupName: '/aws/lambda/rag-api',
    logStreamName: 'stream-1',
    getRemainingTimeInMillis: () => 30000,
    done: () => {},
    fail: () => {},
    succeed: () => {},
    ...overrides,
  };
}

interface HttpEventOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

/** Payload v2 event as sent by Function URLs and HTTP APIs. */
export function httpEvent(rawPath: string, stage: string, options: HttpEventOptions = {}) {
  const method = options.method ?? 'GET';
  return {
    version: '2.0',
    routeKey: '$default',
    rawPath,
    rawQueryString: '',
    headers: {
      host: 'api.example.test',
      accept: 'application/json',
      ...options.headers,
    },
    requestContext: {
      accountId: '000000000000',
      apiId: 'test-api',
      domainName: 'api.example.test',
      requestId: 'request-1',
      routeKey: '$default',
      stage,
      time: '01/Jan/2026:00:00:00 +0000',
      timeEpoch: 1767225600000,
      http: {
        method,
        path: rawPath,
        protocol: 'HTTP/1.1',
        sourceIp: '127.0.0.1',
        userAgent: 'vitest',
      },
    },
    body: options.body,
    isBase64Encoded: false,
  };
}
