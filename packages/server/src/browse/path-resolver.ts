import { join, resolve, sep } from "node:path";
import type { ResolveResult } from "@serveit/shared";
import type { FileSystem } from "./file-system.js";
import { debug } from "../utils/debug.js";

/**
 * Turn the path part of a request URL into a filesystem target under `root`.
 *
 * `rawPath` is still percent-encoded and may be empty (the root itself).
 * Paths whose `.`/`..` segments lead outside the root are reported as not
 * found, the same as paths that do not exist.
 */
export async function resolveRequestPath(
  root: string,
  rawPath: string,
  fs: FileSystem,
): Promise<ResolveResult> {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return { ok: false, error: "BadRequest", message: "Bad URL encoding" };
  }

  const candidate = resolve(join(root, decoded));
  if (!isWithinRoot(root, candidate)) {
    debug("resolve", `outside root: ${candidate}`);
    return { ok: false, error: "NotFound", message: "Not found" };
  }

  try {
    const info = await fs.stat(candidate);
    return {
      ok: true,
      target: {
        path: candidate,
        kind: info.isDirectory() ? "directory" : "file",
        isRoot: candidate === root,
      },
    };
  } catch (err) {
    debug("resolve", `stat failed for ${candidate}:`, err);
    return { ok: false, error: "NotFound", message: "Not found" };
  }
}

export function isWithinRoot(root: string, candidate: string): boolean {
  if (candidate === root) return true;
  const prefix = root.endsWith(sep) ? root : root + sep;
  return candidate.startsWith(prefix);
}
