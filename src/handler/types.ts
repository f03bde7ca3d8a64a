import type { KeyRejection } from '../resolve/asset-key.js';

export type DeclineReason = 'out-of-scope' | 'method' | 'not-found' | KeyRejection;

export type HandlerOutcome =
  | { kind: 'served'; response: Response }
  | { kind: 'declined'; reason: DeclineReason };

/**
 * A link in a request chain: produces a response or declines so the next
 * handler can try
 */
export interface Handler {
  handle(request: Request): Promise<HandlerOutcome>;
}

export function served(response: Response): HandlerOutcome {
  return { kind: 'served', response };
}

export function declined(reason: DeclineReason): HandlerOutcome {
  return { kind: 'declined', reason };
}
