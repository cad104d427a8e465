// src/errors.ts
import type express from 'express';
import { ZodError } from 'zod';

/** Любой сбой на стороне облака: сеть, HTTP-статус, неожиданный ответ, упавший прогон */
export class CloudError extends Error {
  readonly status: number | undefined;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'CloudError';
    this.status = opts.status;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export type ErrorBody = {
  error: { code: string; message: string; details?: unknown };
};

/** единый ответ об ошибке для всех роутов */
export function sendError(res: express.Response, e: unknown) {
  if (e instanceof ZodError) {
    const body: ErrorBody = { error: { code: 'VALIDATION_ERROR', message: 'Invalid payload', details: e.issues } };
    return res.status(422).json(body);
  }
  if (e instanceof NotFoundError) {
    const body: ErrorBody = { error: { code: 'NOT_FOUND', message: e.message } };
    return res.status(404).json(body);
  }

  console.error(e);
  const code = e instanceof CloudError ? 'CLOUD_ERROR' : 'INTERNAL';
  const message = e instanceof Error && e.message ? e.message : 'internal error';
  const body: ErrorBody = { error: { code, message } };
  return res.status(500).json(body);
}
