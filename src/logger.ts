import { appendFileSync, mkdirSync, existsSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";

// Log to user's config folder unless the settings name another file
export const LOG_FILE = join(homedir(), ".command-host", "debug.log");

let debugEnabled = false;
let logFile = LOG_FILE;
let startTime: number | null = null;

function ensureLogDir(): void {
  const dir = dirname(logFile);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function initLog(enabled: boolean, file: string = LOG_FILE): void {
  debugEnabled = enabled;
  logFile = file;
  if (!debugEnabled) return;

  ensureLogDir();
  startTime = Date.now();
  // Start fresh log file for each debug session
  writeFileSync(logFile, `=== Debug log started at ${new Date().toISOString()} ===\n`);
}

export function log(message: string): void {
  if (!debugEnabled) return;

  ensureLogDir();
  const elapsed = startTime ? Date.now() - startTime : 0;
  const line = `[+${elapsed.toString().padStart(6)}ms] ${message}\n`;
  appendFileSync(logFile, line);
}
