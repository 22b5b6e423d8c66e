import { describe, it, expect } from "vitest";
import os from "node:os";
import path from "node:path";
import { ZodError } from "zod";
import { DEFAULT_MAX_FILE_SIZE, loadConfig } from "../../src/util/config.js";

describe("loadConfig", () => {
  it("should derive every path from the home directory by default", () => {
    const home = path.join(os.homedir(), ".bytewarden");
    expect(loadConfig({})).toEqual({
      homeDir: home,
      dbPath: path.join(home, "data", "signatures.db"),
      logDir: path.join(home, "log"),
      logLevel: "info",
      maxFileSize: DEFAULT_MAX_FILE_SIZE,
      signaturesFile: undefined,
    });
  });

  it("should honor explicit overrides", () => {
    const config = loadConfig({
      BYTEWARDEN_HOME: "/srv/bw",
      BYTEWARDEN_DB_PATH: "/var/lib/bw/sigs.db",
      BYTEWARDEN_LOG_DIR: "/var/log/bw",
      BYTEWARDEN_LOG_LEVEL: "DEBUG",
      BYTEWARDEN_MAX_FILE_SIZE: "2048",
      BYTEWARDEN_SIGNATURES_FILE: "/etc/bw/signatures.json",
    });
    expect(config).toEqual({
      homeDir: "/srv/bw",
      dbPath: "/var/lib/bw/sigs.db",
      logDir: "/var/log/bw",
      logLevel: "debug",
      maxFileSize: 2048,
      signaturesFile: "/etc/bw/signatures.json",
    });
  });

  it("should expand a leading tilde", () => {
    const config = loadConfig({ BYTEWARDEN_HOME: "/srv/bw", BYTEWARDEN_DB_PATH: "~/sigs.db" });
    expect(config.dbPath).toBe(path.join(os.homedir(), "sigs.db"));
  });

  it("should treat an empty path variable as unset", () => {
    const config = loadConfig({ BYTEWARDEN_HOME: "/srv/bw", BYTEWARDEN_LOG_DIR: "" });
    expect(config.logDir).toBe(path.join("/srv/bw", "log"));
  });

  it.each([
    ["BYTEWARDEN_LOG_LEVEL", "loud"],
    ["BYTEWARDEN_MAX_FILE_SIZE", "0"],
    ["BYTEWARDEN_MAX_FILE_SIZE", "-5"],
    ["BYTEWARDEN_MAX_FILE_SIZE", "lots"],
  ])("should reject %s=%s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ZodError);
  });
});
