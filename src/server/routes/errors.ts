import { Response } from "express";
import { RouteFsError, toError } from "../../core/errors";
import { Logger } from "../../core/logger";

/**
 * Standard error envelope. Known errors keep their status and code;
 * anything else is an internal error and gets logged.
 */
export function sendError(res: Response, error: unknown, logger: Logger) {
  if (error instanceof RouteFsError) {
    return res.status(error.statusCode ?? 500).json({
      ok: false,
      error: { code: error.code, message: error.message, details: error.details },
    });
  }

  const err = toError(error);
  logger.error(err);
  return res.status(500).json({
    ok: false,
    error: { code: "internal_error", message: err.message },
  });
}
