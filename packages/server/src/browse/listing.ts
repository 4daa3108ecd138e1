/**
 * Directory enumeration and the HTML index page.
 */

import type { DirectoryEntry } from "@serveit/shared";
import type { FileSystem } from "./file-system.js";
import { encodeHref, escapeHtml } from "./html.js";

const PREAMBLE =
  "<!doctype html><html><head><meta charset='utf-8'>" +
  "<title>Index</title>" +
  "<style>body{font-family:system-ui,Arial,sans-serif} a{text-decoration:none}</style>" +
  "</head><body>" +
  "<h1>Index</h1><ul>";

const UP_LINK = '<li><a href="../">../</a></li>';

const CLOSING = "</ul></body></html>";

/** Byte-wise comparison of the UTF-8 encodings of two names. */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

/**
 * List the immediate children of `dir`, sorted by name.
 * Rejects when the directory cannot be enumerated.
 */
export async function listDirectory(
  dir: string,
  fs: FileSystem,
): Promise<DirectoryEntry[]> {
  const children = await fs.readdir(dir);

  const entries = children.map((child): DirectoryEntry => {
    let isDirectory = false;
    try {
      isDirectory = child.isDirectory();
    } catch {
      // Unknown type: list it as a plain file
    }
    return { name: child.name, isDirectory };
  });

  return entries.sort((a, b) => compareNames(a.name, b.name));
}

function renderEntry(entry: DirectoryEntry): string {
  const label = entry.isDirectory ? `${entry.name}/` : entry.name;
  const href = entry.isDirectory
    ? `${encodeHref(entry.name)}/`
    : encodeHref(entry.name);
  return `<li><a href="${href}">${escapeHtml(label)}</a></li>`;
}

export function renderListing(
  entries: DirectoryEntry[],
  opts: { isRoot: boolean },
): string {
  let html = PREAMBLE;
  if (!opts.isRoot) html += UP_LINK;
  for (const entry of entries) {
    html += renderEntry(entry);
  }
  return html + CLOSING;
}
