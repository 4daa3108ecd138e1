import type { ResolvedTarget, ServeResult } from "@serveit/shared";
import type { FileSystem } from "./file-system.js";
import { contentTypeFor } from "./content-type.js";
import { listDirectory, renderListing } from "./listing.js";
import { debug } from "../utils/debug.js";

/** Build the response for a target the resolver confirmed exists. */
export async function renderTarget(
  target: ResolvedTarget,
  fs: FileSystem,
): Promise<ServeResult> {
  if (target.kind === "directory") {
    return renderDirectory(target, fs);
  }

  let body: Buffer;
  try {
    body = await fs.readFile(target.path);
  } catch (err) {
    debug("render", `read failed for ${target.path}:`, err);
    return { ok: false, error: "Forbidden", message: "Cannot read file" };
  }

  return {
    ok: true,
    kind: "file",
    contentType: contentTypeFor(target.path),
    body,
  };
}

async function renderDirectory(
  target: ResolvedTarget,
  fs: FileSystem,
): Promise<ServeResult> {
  try {
    const entries = await listDirectory(target.path, fs);
    return {
      ok: true,
      kind: "directory",
      contentType: "text/html; charset=utf-8",
      body: renderListing(entries, { isRoot: target.isRoot }),
    };
  } catch (err) {
    debug("render", `readdir failed for ${target.path}:`, err);
    return { ok: false, error: "Forbidden", message: "Cannot read directory" };
  }
}
