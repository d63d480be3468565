import type { Response } from 'express';
import { isEngineError } from '../engine/errors.js';

export type HttpErrorShape = {
  status: number;
  message: string;
};

export function errStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status: unknown = Reflect.get(error, 'status');
    if (typeof status === 'number') {
      return status;
    }
  }

  return 500;
}

export function errMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function toHttpError(error: unknown): HttpErrorShape {
  return {
    status: errStatus(error),
    message: errMessage(error)
  };
}

export function sendRequestValidationError(res: Response, details: unknown): void {
  res.status(400).json({
    error: 'Invalid request',
    details
  });
}

export function sendSimpleError(res: Response, status: number, message: string): void {
  res.status(status).json({ error: message });
}

/** Engine errors carry their kind; anything else is a plain 500. */
export function sendEngineError(res: Response, error: unknown): void {
  const { status, message } = toHttpError(error);
  if (isEngineError(error)) {
    res.status(status).json({ error: message, kind: error.kind });
    return;
  }
  sendSimpleError(res, status, message);
}
