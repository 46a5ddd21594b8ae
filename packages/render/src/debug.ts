/**
 * streamtab debug logging.
 * Enable with STREAMTAB_DEBUG=1 environment variable.
 */
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";

let enabled = process.env.STREAMTAB_DEBUG === "1";
let debugLogPath: string | null = null;

/**
 * Log debug message to ~/.local/share/streamtab/debug.log
 * Only active when STREAMTAB_DEBUG=1 environment variable is set.
 */
export function debugLog(msg: string): void {
  if (!enabled) return;
  try {
    if (!debugLogPath) {
      debugLogPath = join(process.env.HOME ?? "/tmp", ".local", "share", "streamtab", "debug.log");
      mkdirSync(dirname(debugLogPath), { recursive: true });
    }
    const ts = new Date().toISOString();
    appendFileSync(debugLogPath, `[${ts}] ${msg}\n`);
  } catch {
    // Logging never interrupts rendering; stop trying after the first failure.
    enabled = false;
  }
}
