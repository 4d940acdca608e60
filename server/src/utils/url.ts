import type { Request } from 'express';
import { config } from '../config.js';

function firstForwardedValue(req: Request, header: string) {
  return req.get(header)?.split(',')[0]?.trim() || undefined;
}

/** Public origin of the service as seen by the caller, honouring reverse-proxy headers. */
export function getRequestOrigin(req: Request): string {
  const host = firstForwardedValue(req, 'x-forwarded-host') ?? req.get('host');
  if (!host) {
    return config.baseUrl;
  }
  const protocol = firstForwardedValue(req, 'x-forwarded-proto') ?? req.protocol;
  return `${protocol}://${host}`;
}
