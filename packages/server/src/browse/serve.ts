import type { ServeResult } from "@serveit/shared";
import type { FileSystem } from "./file-system.js";
import { resolveRequestPath } from "./path-resolver.js";
import { renderTarget } from "./renderer.js";

/** Resolve and render one request path against `root`. */
export async function serveRequest(
  root: string,
  rawPath: string,
  fs: FileSystem,
): Promise<ServeResult> {
  const resolved = await resolveRequestPath(root, rawPath, fs);
  if (!resolved.ok) return resolved;
  return renderTarget(resolved.target, fs);
}
