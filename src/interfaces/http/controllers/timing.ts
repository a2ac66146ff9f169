import '@shared/express';
import type { TimingMeta } from '@shared/types';
import type { Request } from 'express';

/** `meta.totalTimeMs` from the timestamp set by the requestTimer middleware. */
export function timingMeta(req: Request): TimingMeta | undefined {
  if (req.requestStartTime == null) return undefined;
  return { totalTimeMs: Math.round(Date.now() - req.requestStartTime) };
}
