import type { Handler } from './types.js';

export type FetchHandler = (request: Request) => Promise<Response>;

export type Fallback = (request: Request) => Response | Promise<Response>;

export function notFoundResponse(): Response {
  return new Response('Not found', {
    status: 404,
    headers: { 'Content-Type': 'text/plain' },
  });
}

/**
 * Run handlers in order and return the first served response. When every
 * handler declines, `fallback` answers.
 */
export function createFetchHandler(
  handlers: readonly Handler[],
  fallback: Fallback = notFoundResponse
): FetchHandler {
  return async (request: Request): Promise<Response> => {
    for (const handler of handlers) {
      const outcome = await handler.handle(request);
      if (outcome.kind === 'served') {
        return outcome.response;
      }
    }
    return fallback(request);
  };
}
