/**
 * Zod validation schemas for API routes
 */

import { z } from "zod";

// A single route segment: one path component, never a traversal step
export const SegmentSchema = z
  .string()
  .max(255, "Segment must not exceed 255 characters")
  .refine((val) => val !== "." && val !== "..", "Traversal segments not allowed")
  .refine((val) => !/[\\/]/.test(val), "Separators not allowed inside a segment")
  .refine((val) => !val.includes("\0"), "Null bytes not allowed in segments");

export const RouteSchema = z.array(SegmentSchema).min(1, "Route must name a partition");

// ?route=site&route=posts arrives as an array, ?route=site as a string
export const RouteQuerySchema = z
  .object({
    route: z.union([SegmentSchema, z.array(SegmentSchema).min(1)]).transform((v) => (Array.isArray(v) ? v : [v])),
  })
  .strict();

export const ChangesQuerySchema = z
  .object({
    since: z.coerce.number().finite().optional(),
  })
  .strict();

export const RecordChangeSchema = z
  .object({
    route: RouteSchema,
    timestamp: z.number().finite().nonnegative().optional(),
  })
  .strict();
