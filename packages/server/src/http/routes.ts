/**
 * Browse routes: every GET under `/` is served from the configured root.
 */

import type { ServerResponse } from "node:http";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ServeErrorKind, ServeResult } from "@serveit/shared";
import type { FileSystem } from "../browse/file-system.js";
import { serveRequest } from "../browse/serve.js";
import { debug } from "../utils/debug.js";

export interface BrowseRouteOptions {
  root: string;
  fs: FileSystem;
}

const ERROR_STATUS: Record<ServeErrorKind, number> = {
  BadRequest: 400,
  NotFound: 404,
  Forbidden: 403,
};

const TEXT_PLAIN = "text/plain; charset=utf-8";

/** Path portion of a raw request URL, without the leading slash. */
export function rawPathOf(url: string): string {
  const q = url.indexOf("?");
  const path = q === -1 ? url : url.slice(0, q);
  return path.startsWith("/") ? path.slice(1) : path;
}

export function sendResult(reply: FastifyReply, result: ServeResult): FastifyReply {
  if (!result.ok) {
    return reply
      .code(ERROR_STATUS[result.error])
      .type(TEXT_PLAIN)
      .send(result.message);
  }
  return reply.code(200).type(result.contentType).send(result.body);
}

/**
 * Answer a URL the router refused to parse. Runs outside the route
 * lifecycle, so it writes to the raw response.
 */
export function writeBadUrl(res: ServerResponse): void {
  res.writeHead(ERROR_STATUS.BadRequest, { "content-type": TEXT_PLAIN });
  res.end("Bad URL encoding");
}

export function registerBrowseRoutes(
  app: FastifyInstance,
  opts: BrowseRouteOptions,
): void {
  const handler = async (req: FastifyRequest, reply: FastifyReply) => {
    const rawPath = rawPathOf(req.url);
    const result = await serveRequest(opts.root, rawPath, opts.fs);
    debug("http", req.method, req.url, result.ok ? 200 : result.error);
    return sendResult(reply, result);
  };

  app.get("/", handler);
  app.get("/*", handler);

  // The router gives up on some malformed URLs without matching "/*";
  // those still go through the resolver so they get the same 400.
  app.setNotFoundHandler(async (req, reply) => {
    if (req.method === "GET" || req.method === "HEAD") {
      return handler(req, reply);
    }
    return reply.code(404).type(TEXT_PLAIN).send("Not found");
  });
}
