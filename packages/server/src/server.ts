import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { ServerConfig } from "./config/config.js";
import { nodeFileSystem } from "./browse/file-system.js";
import type { FileSystem } from "./browse/file-system.js";
import { registerBrowseRoutes, writeBadUrl } from "./http/routes.js";

/**
 * Build the HTTP server for `config.root`. The instance is not listening yet;
 * call `listen()` on it, or `inject()` in tests.
 */
export function createServer(
  config: Pick<ServerConfig, "root">,
  fs: FileSystem = nodeFileSystem,
): FastifyInstance {
  const app = Fastify({
    logger: false,
    frameworkErrors: (err, _req, reply) => {
      if (err.code !== "FST_ERR_BAD_URL") {
        console.error("[http] request rejected:", err.message);
      }
      writeBadUrl(reply.raw);
    },
  });

  app.setErrorHandler((err, _req, reply) => {
    console.error("[http] request failed:", err);
    return reply
      .code(500)
      .type("text/plain; charset=utf-8")
      .send("Internal server error");
  });

  registerBrowseRoutes(app, { root: config.root, fs });
  return app;
}
