const DEBUG =
  process.env.SERVEIT_DEBUG === "1" ||
  process.env.SERVEIT_DEBUG === "true";

export function debug(tag: string, ...args: unknown[]): void {
  if (DEBUG) console.log(`[DEBUG:${tag}]`, ...args);
}
