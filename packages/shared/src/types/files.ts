/** One immediate child of a listed directory. */
export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export type TargetKind = "file" | "directory";

/** A request path that exists under the server root. */
export interface ResolvedTarget {
  /** Absolute filesystem path */
  path: string;
  kind: TargetKind;
  /** True when the target is the server root itself */
  isRoot: boolean;
}
