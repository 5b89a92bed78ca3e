/**
 * Response translation
 * Maps handler replies and thrown errors onto HTTP status codes and JSON bodies.
 * Error bodies are JSON-encoded strings, not objects.
 */

import type { Request, Response, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { StorageError } from '../storage/errors.js';

// ============================================
// Types
// ============================================

export interface Reply<T = unknown> {
  status: number;
  body: T;
}

export interface RespondOptions {
  /**
   * Status used when the storage layer rejects a statement on a schema
   * constraint. Defaults to 500, like every other storage failure.
   */
  constraintStatus?: number;
}

export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

// ============================================
// Builders
// ============================================

export const ok = <T>(body: T): Reply<T> => ({ status: 200, body });
export const created = <T>(body: T): Reply<T> => ({ status: 201, body });

export const badRequest = (message: string): ApiError => new ApiError(400, message);
export const notFound = (message: string): ApiError => new ApiError(404, message);
export const conflict = (message: string): ApiError => new ApiError(409, message);

// ============================================
// Translation
// ============================================

export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Translate a thrown value into a status and message.
 * `internal` marks failures that are not the client's fault and should be logged.
 */
export function translateError(
  error: unknown,
  options: RespondOptions = {}
): Reply<string> & { internal: boolean } {
  if (error instanceof ApiError) {
    return { status: error.status, body: error.message, internal: false };
  }

  if (error instanceof ZodError) {
    return { status: 400, body: formatZodError(error), internal: false };
  }

  if (error instanceof StorageError) {
    if (error.isConstraint() && options.constraintStatus !== undefined) {
      return { status: options.constraintStatus, body: error.message, internal: false };
    }
    return { status: 500, body: error.message, internal: true };
  }

  return { status: 500, body: 'Internal server error.', internal: true };
}

/**
 * Wrap a synchronous handler: its reply is sent as JSON, anything it throws
 * is translated into an error response.
 */
export function respond(
  handler: (req: Request) => Reply,
  options: RespondOptions = {}
): RequestHandler {
  return (req: Request, res: Response) => {
    let reply: Reply;
    try {
      reply = handler(req);
    } catch (error) {
      const translated = translateError(error, options);
      if (translated.internal) {
        req.log.error({ err: error }, 'Request failed');
      }
      res.status(translated.status).json(translated.body);
      return;
    }
    res.status(reply.status).json(reply.body);
  };
}
