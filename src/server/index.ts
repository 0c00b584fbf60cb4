import http from "http";
import { createHttpServer } from "./http";
import { vfsRoutes } from "./routes/vfs";
import { Logger } from "../core/logger";
import { Vfs } from "../core/vfs";

export interface StartServerOptions {
  vfs: Vfs;
  logger: Logger;
  port: number;
  allowedOrigins?: string[];
}

export function createApp({ vfs, logger, allowedOrigins }: Omit<StartServerOptions, "port">) {
  return createHttpServer({
    routes: {
      vfs: vfsRoutes(vfs, logger.child({ component: "http" })),
    },
    allowedOrigins: allowedOrigins ?? ["http://localhost:3000"],
  });
}

/**
 * Listen on `port` (0 picks a free one). Resolves once the socket is bound.
 */
export function startServer(options: StartServerOptions): Promise<http.Server> {
  const app = createApp(options);
  const server = http.createServer(app);
  const { logger, port } = options;

  return new Promise((resolve, reject) => {
    server.once("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.fatal(`Port ${port} is already in use`, { port });
      }
      reject(error);
    });

    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === "object" && address ? address.port : port;
      logger.info("routefs server is running", {
        http: `http://localhost:${boundPort}`,
        partitions: options.vfs.partitions.names(),
      });
      resolve(server);
    });
  });
}
