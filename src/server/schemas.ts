/**
 * Request schemas
 * zod schemas for request bodies and path parameters
 */

import { z } from 'zod';
import { MACHINE_TYPES, REPORT_TYPES } from '../types/index.js';
import { badRequest } from './responses.js';

/** Enum tokens are lowercase on the wire; accept any letter case on input */
const lowercased = (value: unknown): unknown => (typeof value === 'string' ? value.toLowerCase() : value);

export const machineTypeSchema = z.preprocess(lowercased, z.enum(MACHINE_TYPES));
export const reportTypeSchema = z.preprocess(lowercased, z.enum(REPORT_TYPES));

const idSchema = z.number().int().safe();

export const roomSubmissionSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
});

export const machineSubmissionSchema = z.object({
  room_id: idSchema,
  machine_id: z.string().min(1),
  machine_type: machineTypeSchema,
});

export const userSubmissionSchema = z.object({
  username: z.string().min(1),
  admin: z.boolean(),
});

export const reportSubmissionSchema = z.object({
  room_id: idSchema,
  machine_id: z.string().min(1),
  reporter_username: z.string().min(1),
  report_type: reportTypeSchema,
  description: z.string().nullish(),
});

export const archiveRequestSchema = z.object({
  report_id: idSchema,
});

/**
 * Parse a numeric path parameter such as `room_id`.
 * Any integer is accepted; an id with no row is a lookup miss, not a bad request.
 */
export function parseIdParam(value: string | undefined, name: string): number {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw badRequest(`Invalid ${name}: ${value ?? ''}`);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw badRequest(`Invalid ${name}: ${value}`);
  }
  return id;
}
