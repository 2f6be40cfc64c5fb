import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

export const API_KEY_HEADER = 'X-API-Key';
export const INVALID_API_KEY_DETAIL = 'Invalid or missing API key';

/**
 * `disabled` is only reachable in simulate mode without `VCT_API_KEY`; live
 * startup refuses to run without a key.
 */
export type ApiKeyPolicy = { readonly kind: 'required'; readonly key: string } | { readonly kind: 'disabled' };

export function apiKeyPolicyFor(apiKey: string | undefined): ApiKeyPolicy {
  return apiKey ? { kind: 'required', key: apiKey } : { kind: 'disabled' };
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireApiKey(policy: ApiKeyPolicy): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (policy.kind === 'disabled') return next();

    const provided = req.get(API_KEY_HEADER);
    if (provided !== undefined && keysMatch(provided, policy.key)) return next();

    res.set('WWW-Authenticate', 'API-Key').status(401).json({ detail: INVALID_API_KEY_DETAIL });
  };
}
