import { delimiter, resolve } from "node:path";
import { log } from "./logging/index.ts";

export interface Config {
  roots: string[];
  sevenZipPath: string;
  archiveToolTimeout: number;
}

function parseRoots(value: string): string[] {
  const roots = value
    .split(delimiter)
    .map((root) => root.trim())
    .filter((root) => root.length > 0)
    .map((root) => resolve(root));

  if (roots.length === 0) {
    log.error("Config", `Invalid LIBRARY_ROOTS: ${value} (no directories given)`);
    process.exit(1);
  }
  return roots;
}

function parseTimeout(value: string): number {
  const timeout = parseInt(value, 10);
  if (isNaN(timeout) || timeout < 1) {
    log.error("Config", `Invalid ARCHIVE_TOOL_TIMEOUT_MS: ${value} (must be a positive number)`);
    process.exit(1);
  }
  return timeout;
}

function loadConfig(): Config {
  return {
    roots: parseRoots(process.env.LIBRARY_ROOTS || "./library"),
    sevenZipPath: process.env.SEVEN_ZIP || "7zz",
    archiveToolTimeout: parseTimeout(process.env.ARCHIVE_TOOL_TIMEOUT_MS || "15000"),
  };
}

export const config = loadConfig();
