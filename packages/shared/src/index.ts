export type * from "./types/files.js";
export type * from "./types/serve.js";
