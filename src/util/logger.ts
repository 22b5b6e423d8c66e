import fs from "node:fs";
import path from "node:path";
import pino, { type Logger } from "pino";

export type { Logger };

export type LoggerOptions = {
  level: string;
  /** Directory for daily JSON log files; console only when omitted */
  logDir?: string;
  /** Human-readable console output via pino-pretty (default: not production) */
  pretty?: boolean;
};

const DAILY_LOG_RE = /^(\d{4})-(\d{2})-(\d{2})\.log$/;

export function dailyLogName(now = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}.log`;
}

// Console output goes to stderr so stdout only carries command results.
export function createLogger(opts: LoggerOptions): Logger {
  const pretty = opts.pretty ?? process.env.NODE_ENV !== "production";

  if (!opts.logDir && !pretty) {
    return pino({ level: opts.level }, pino.destination(2));
  }

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? {
          target: "pino-pretty",
          level: opts.level,
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            destination: 2,
          },
        }
      : { target: "pino/file", level: opts.level, options: { destination: 2 } },
  ];
  if (opts.logDir) {
    targets.push({
      target: "pino/file",
      level: opts.level,
      options: {
        destination: path.join(opts.logDir, dailyLogName()),
        mkdir: true,
      },
    });
  }

  return pino({ level: opts.level }, pino.transport({ targets }));
}

/**
 * Delete daily log files beyond the newest `keep` days.
 * Returns the names of the removed files.
 */
export function pruneLogFiles(logDir: string, keep = 30, now = new Date()): string[] {
  if (!fs.existsSync(logDir)) return [];

  const cutoff = new Date(now.getFullYear(), now.getMonth(), now.getDate() - keep);
  const removed: string[] = [];

  for (const name of fs.readdirSync(logDir)) {
    const m = DAILY_LOG_RE.exec(name);
    if (!m) continue;
    const day = new Date(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
    if (day < cutoff) {
      fs.rmSync(path.join(logDir, name), { force: true });
      removed.push(name);
    }
  }
  return removed.sort();
}
