import os from "node:os";
import path from "node:path";
import { z } from "zod";

export const DEFAULT_MAX_FILE_SIZE = 100 * 1024 * 1024;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? expandHome(v) : undefined));

const schema = z.object({
  BYTEWARDEN_HOME: z
    .string()
    .trim()
    .min(1)
    .default("~/.bytewarden")
    .transform(expandHome),
  BYTEWARDEN_DB_PATH: optionalPath,
  BYTEWARDEN_LOG_DIR: optionalPath,
  BYTEWARDEN_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  BYTEWARDEN_MAX_FILE_SIZE: z.coerce
    .number()
    .int()
    .positive("BYTEWARDEN_MAX_FILE_SIZE must be a positive integer")
    .default(DEFAULT_MAX_FILE_SIZE),
  BYTEWARDEN_SIGNATURES_FILE: optionalPath,
});

export type AppConfig = {
  homeDir: string;
  dbPath: string;
  logDir: string;
  logLevel: (typeof LOG_LEVELS)[number];
  maxFileSize: number;
  signaturesFile?: string;
};

/**
 * Resolve configuration from the environment (call `import "dotenv/config"`
 * first at the entry point). Throws a ZodError naming the bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.parse(env);
  return {
    homeDir: parsed.BYTEWARDEN_HOME,
    dbPath:
      parsed.BYTEWARDEN_DB_PATH ??
      path.join(parsed.BYTEWARDEN_HOME, "data", "signatures.db"),
    logDir: parsed.BYTEWARDEN_LOG_DIR ?? path.join(parsed.BYTEWARDEN_HOME, "log"),
    logLevel: parsed.BYTEWARDEN_LOG_LEVEL,
    maxFileSize: parsed.BYTEWARDEN_MAX_FILE_SIZE,
    signaturesFile: parsed.BYTEWARDEN_SIGNATURES_FILE,
  };
}
