/**
 * Zod validation wrappers for Express handlers
 */

import { Request, Response, RequestHandler } from "express";
import { ZodError, ZodType, ZodTypeDef } from "zod";

export type ValidatedHandler<T> = (data: T, req: Request, res: Response) => void;

function validationFailure(res: Response, message: string, error: ZodError) {
  return res.status(400).json({
    ok: false,
    error: {
      code: "validation_error",
      message,
      details: error.errors.map((err) => ({
        path: err.path.join("."),
        message: err.message,
        code: err.code,
      })),
    },
  });
}

/**
 * Validate the request body, then hand the parsed value to `handler`.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: ValidatedHandler<T>): RequestHandler {
  return (req, res) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      validationFailure(res, "Request validation failed", result.error);
      return;
    }
    handler(result.data, req, res);
  };
}

/**
 * Validate query parameters, then hand the parsed value to `handler`.
 */
export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: ValidatedHandler<T>): RequestHandler {
  return (req, res) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      validationFailure(res, "Query validation failed", result.error);
      return;
    }
    handler(result.data, req, res);
  };
}
