import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, formatAddress, loadConfig } from "../config.js";

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = realpathSync(mkdtempSync(join(tmpdir(), "serveit-config-")));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("uses defaults and the working directory", async () => {
    expect(await loadConfig([], {}, tmpDir)).toEqual({
      action: "serve",
      config: { interface: "127.0.0.1", port: 8080, root: tmpDir },
    });
  });

  it("reads short flags", async () => {
    const cmd = await loadConfig(["-i", "::1", "-p", "9000", "-d", tmpDir], {}, "/");
    expect(cmd).toEqual({
      action: "serve",
      config: { interface: "::1", port: 9000, root: tmpDir },
    });
  });

  it("reads long flags", async () => {
    const cmd = await loadConfig(
      ["--interface", "0.0.0.0", "--port=0", `--dir=${tmpDir}`],
      {},
      "/",
    );
    expect(cmd).toEqual({
      action: "serve",
      config: { interface: "0.0.0.0", port: 0, root: tmpDir },
    });
  });

  it("canonicalizes the directory", async () => {
    const cmd = await loadConfig(["-d", join(tmpDir, ".", "x", "..")], {}, "/");
    expect(cmd).toMatchObject({ config: { root: tmpDir } });
  });

  it("falls back to environment variables", async () => {
    const env = { SERVEIT_INTERFACE: "0.0.0.0", SERVEIT_PORT: "3000", SERVEIT_DIR: tmpDir };
    expect(await loadConfig([], env, "/")).toEqual({
      action: "serve",
      config: { interface: "0.0.0.0", port: 3000, root: tmpDir },
    });
  });

  it("prefers flags over environment variables", async () => {
    const env = { SERVEIT_PORT: "3000", SERVEIT_DIR: "/nonexistent" };
    const cmd = await loadConfig(["-p", "4000", "-d", tmpDir], env, "/");
    expect(cmd).toMatchObject({ config: { port: 4000, root: tmpDir } });
  });

  it("returns help and version commands", async () => {
    expect(await loadConfig(["--help"], {}, tmpDir)).toEqual({ action: "help" });
    expect(await loadConfig(["-h"], {}, tmpDir)).toEqual({ action: "help" });
    expect(await loadConfig(["-V"], {}, tmpDir)).toEqual({ action: "version" });
  });

  it("rejects a non-numeric port", async () => {
    await expect(loadConfig(["-p", "abc"], {}, tmpDir)).rejects.toThrow(
      "invalid port: must be a number",
    );
  });

  it("rejects an out-of-range port", async () => {
    await expect(loadConfig(["-p", "70000"], {}, tmpDir)).rejects.toThrow(
      "invalid port: must be at most 65535",
    );
  });

  it("rejects a hostname as interface", async () => {
    await expect(loadConfig(["-i", "localhost"], {}, tmpDir)).rejects.toThrow(
      "invalid interface: must be an IPv4 or IPv6 address",
    );
  });

  it("rejects unknown flags", async () => {
    await expect(loadConfig(["--verbose"], {}, tmpDir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a directory that does not exist", async () => {
    await expect(loadConfig(["-d", join(tmpDir, "nope")], {}, tmpDir)).rejects.toThrow(
      /^cannot canonicalize dir /,
    );
  });

  it("rejects a file as the directory", async () => {
    const file = join(tmpDir, "a.txt");
    writeFileSync(file, "hi");
    await expect(loadConfig(["-d", file], {}, tmpDir)).rejects.toThrow(
      `not a directory: ${file}`,
    );
  });
});

describe("formatAddress", () => {
  it("brackets IPv6 hosts", () => {
    expect(formatAddress("::1", 80)).toBe("[::1]:80");
    expect(formatAddress("127.0.0.1", 8080)).toBe("127.0.0.1:8080");
  });
});
