/**
 * Command-line and environment configuration.
 *
 * Flags win over `SERVEIT_*` environment variables, which win over the
 * built-in defaults. The served directory is canonicalized here, once, and
 * never changes afterwards.
 */

import { isIP } from "node:net";
import { realpath, stat } from "node:fs/promises";
import { parseArgs } from "node:util";
import { z } from "zod";

export const VERSION = "0.1.0";

export const USAGE = `Usage: serveit [options]

Serve a directory over HTTP (with directory listings)

Options:
  -i, --interface <addr>  Interface to bind (default: 127.0.0.1)
  -p, --port <port>       Port to bind (default: 8080)
  -d, --dir <path>        Directory to serve (default: current directory)
  -h, --help              Show this help message
  -V, --version           Print version`;

export interface ServerConfig {
  /** IP literal to bind */
  interface: string;
  port: number;
  /** Canonical absolute path of the served directory */
  root: string;
}

export type CliCommand =
  | { action: "help" }
  | { action: "version" }
  | { action: "serve"; config: ServerConfig };

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const rawConfigSchema = z.object({
  interface: z.string().refine((v) => isIP(v) !== 0, {
    message: "must be an IPv4 or IPv6 address",
  }),
  port: z
    .string()
    .regex(/^\d+$/, "must be a number")
    .transform(Number)
    .pipe(z.number().int().max(65535, "must be at most 65535")),
  dir: z.string().min(1, "must not be empty"),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `invalid ${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

async function canonicalDir(dir: string): Promise<string> {
  let root: string;
  try {
    root = await realpath(dir);
  } catch (err) {
    throw new ConfigError(
      `cannot canonicalize dir ${dir}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const info = await stat(root);
  if (!info.isDirectory()) {
    throw new ConfigError(`not a directory: ${root}`);
  }
  return root;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        interface: { type: "string", short: "i" },
        port: { type: "string", short: "p" },
        dir: { type: "string", short: "d" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "V" },
      },
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

export async function loadConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<CliCommand> {
  const values = parseFlags(argv);

  if (values.help) return { action: "help" };
  if (values.version) return { action: "version" };

  const parsed = rawConfigSchema.safeParse({
    interface: values.interface ?? env.SERVEIT_INTERFACE ?? "127.0.0.1",
    port: values.port ?? env.SERVEIT_PORT ?? "8080",
    dir: values.dir ?? env.SERVEIT_DIR ?? cwd,
  });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  return {
    action: "serve",
    config: {
      interface: parsed.data.interface,
      port: parsed.data.port,
      root: await canonicalDir(parsed.data.dir),
    },
  };
}

/** `host:port`, with IPv6 hosts bracketed. */
export function formatAddress(host: string, port: number): string {
  return isIP(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}
