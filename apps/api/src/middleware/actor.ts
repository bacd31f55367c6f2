import type { Request } from 'express';

const ACTOR_HEADER = 'x-user-id';

/** Operator identity as forwarded by the authenticating proxy in front of the API. */
export function getActorId(req: Request, fallback = 'system'): string {
  const header = req.header(ACTOR_HEADER)?.trim();
  return header ? header : fallback;
}
