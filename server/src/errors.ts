// server/src/errors.ts

import type { Response } from 'express';
import { ZodError } from 'zod';
import { formatValidationError } from './schemas/statLine.js';

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, public readonly details: string[] = []) {
    super(400, message);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError, message = 'Invalid request'): ValidationError {
    return new ValidationError(message, formatValidationError(error));
  }
}

/**
 * Maps an error to a JSON response. Known HTTP errors keep their status;
 * anything else is logged under `context` and answered with a 500.
 */
export function sendError(res: Response, error: unknown, context: string, failure: string) {
  if (error instanceof ZodError) {
    const invalid = ValidationError.fromZod(error);
    return res.status(invalid.status).json({ error: invalid.message, details: invalid.details });
  }
  if (error instanceof ValidationError) {
    return res.status(error.status).json({ error: error.message, details: error.details });
  }
  if (error instanceof HttpError) {
    return res.status(error.status).json({ error: error.message });
  }

  console.error(`${context}:`, error);
  return res.status(500).json({ error: failure });
}
