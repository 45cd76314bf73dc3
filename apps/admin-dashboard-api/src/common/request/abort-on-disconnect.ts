import type { Response } from 'express';

/**
 * Signal that fires when the client goes away before the response is written,
 * so the matching outbound call is abandoned instead of left running.
 */
export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
