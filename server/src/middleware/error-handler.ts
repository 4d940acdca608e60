import type { NextFunction, Request, Response } from 'express';
import { MESSAGES } from '../utils/constants.js';

function clientErrorStatus(error: unknown) {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
) {
  if (res.headersSent) {
    return next(error);
  }

  // body-parser marks malformed payloads with a 4xx status.
  const status = clientErrorStatus(error);
  if (status !== undefined) {
    return res.status(status).json({ success: false, message: MESSAGES.INVALID_BODY });
  }

  console.error(error);
  return res.status(500).json({ success: false, message: MESSAGES.SERVER_ERROR });
}
