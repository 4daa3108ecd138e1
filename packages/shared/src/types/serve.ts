import type { ResolvedTarget } from "./files.js";

export type ServeErrorKind = "BadRequest" | "NotFound" | "Forbidden";

export interface ServeFailure {
  ok: false;
  error: ServeErrorKind;
  /** Short plain-text body. Never contains a filesystem path. */
  message: string;
}

export interface FileResponse {
  ok: true;
  kind: "file";
  contentType: string;
  body: Buffer;
}

export interface DirectoryResponse {
  ok: true;
  kind: "directory";
  contentType: "text/html; charset=utf-8";
  body: string;
}

export type ServeResult = FileResponse | DirectoryResponse | ServeFailure;

export type ResolveResult = { ok: true; target: ResolvedTarget } | ServeFailure;
