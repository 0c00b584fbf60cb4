import express, { ErrorRequestHandler, Router } from "express";
import cors from "cors";
import bodyParser from "body-parser";

export interface HttpServerDeps {
  routes: {
    vfs: Router;
  };
  allowedOrigins: string[];
}

export function createHttpServer(deps: HttpServerDeps) {
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || deps.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error("Not allowed by CORS"));
      }
    },
  }));

  app.use(bodyParser.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/vfs", deps.routes.vfs);

  app.use((req, res) => {
    res.status(404).json({
      ok: false,
      error: {
        code: "not_found",
        message: `Route ${req.method} ${req.path} not found`,
      },
      availableEndpoints: [
        "GET /health",
        "GET /vfs/partitions",
        "GET /vfs/time",
        "GET /vfs/read?route=<partition>&route=<segment>...",
        "GET /vfs/changes?since=<seconds>",
        "POST /vfs/changes",
        "PUT /vfs/write",
        "DELETE /vfs/delete",
      ],
    });
  });

  // Malformed JSON bodies and CORS rejections land here
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = typeof err?.status === "number" ? err.status : 400;
    res.status(status).json({
      ok: false,
      error: { code: "bad_request", message: err instanceof Error ? err.message : String(err) },
    });
  };
  app.use(onError);

  return app;
}
