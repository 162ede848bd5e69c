/**
 * Pending OAuth flows of a browser session
 *
 * authenticate records the flow id it put into the state; callback only
 * accepts a state whose flow id is pending in the same session.
 */

import type { Request } from 'express';

declare module 'express-session' {
  interface SessionData {
    oauthFlowIds?: string[];
  }
}

/** Oldest flows are dropped beyond this */
export const MAX_PENDING_FLOWS = 10;

export function rememberFlow(req: Request, flowId: string): void {
  const flowIds = [...(req.session.oauthFlowIds ?? []), flowId];
  req.session.oauthFlowIds = flowIds.slice(-MAX_PENDING_FLOWS);
}

export function pendingFlows(req: Request): string[] {
  return req.session.oauthFlowIds ?? [];
}

export function forgetFlow(req: Request, flowId: string): void {
  req.session.oauthFlowIds = pendingFlows(req).filter(id => id !== flowId);
}
