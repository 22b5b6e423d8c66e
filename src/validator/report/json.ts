import fs from "node:fs";
import path from "node:path";
import type { ScanReport } from "./types.js";

export async function writeJsonReport(file: string, report: ScanReport) {
  const json = JSON.stringify(report, null, 2);
  await fs.promises.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.promises.writeFile(file, json, "utf8");
}
