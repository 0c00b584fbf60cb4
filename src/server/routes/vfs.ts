import { Router } from "express";
import { Logger } from "../../core/logger";
import { Vfs } from "../../core/vfs";
import { validateBody, validateQuery } from "../middleware/validation";
import { sendError } from "./errors";
import { ChangesQuerySchema, RecordChangeSchema, RouteQuerySchema } from "./schemas";

export function vfsRoutes(vfs: Vfs, logger: Logger) {
  const r = Router();

  r.get("/partitions", (_req, res) => {
    res.json(vfs.partitions.toJSON());
  });

  r.get("/time", (_req, res) => {
    res.json({ time: vfs.currentTime() });
  });

  r.get(
    "/read",
    validateQuery(RouteQuerySchema, ({ route }, _req, res) => {
      try {
        res.json(vfs.read(route));
      } catch (error: unknown) {
        sendError(res, error, logger);
      }
    })
  );

  r.get(
    "/changes",
    validateQuery(ChangesQuerySchema, ({ since }, _req, res) => {
      // `time` is sampled before the window is built
      const time = vfs.currentTime();
      res.json({ time, changes: vfs.changesSince(since ?? Number.NEGATIVE_INFINITY) });
    })
  );

  r.post(
    "/changes",
    validateBody(RecordChangeSchema, ({ route, timestamp }, _req, res) => {
      try {
        const added = vfs.addChange(timestamp ?? vfs.currentTime(), route);
        res.json({ ok: true, added });
      } catch (error: unknown) {
        sendError(res, error, logger);
      }
    })
  );

  r.put(
    "/write",
    validateQuery(RouteQuerySchema, ({ route }, req, res) => {
      try {
        vfs.write(route, req.body);
      } catch (error: unknown) {
        sendError(res, error, logger);
      }
    })
  );

  r.delete(
    "/delete",
    validateQuery(RouteQuerySchema, ({ route }, _req, res) => {
      try {
        vfs.delete(route);
      } catch (error: unknown) {
        sendError(res, error, logger);
      }
    })
  );

  return r;
}
