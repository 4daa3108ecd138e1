import mime from "mime";

export const FALLBACK_CONTENT_TYPE = "application/octet-stream";

/** Guess a content type from a file path's extension. */
export function contentTypeFor(filePath: string): string {
  return mime.getType(filePath) ?? FALLBACK_CONTENT_TYPE;
}
