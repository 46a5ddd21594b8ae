import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("debugLog", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "streamtab-debug-"));
    vi.stubEnv("HOME", home);
    vi.resetModules();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(home, { recursive: true, force: true });
  });

  it("writes nothing unless STREAMTAB_DEBUG=1", async () => {
    vi.stubEnv("STREAMTAB_DEBUG", "");
    const { debugLog } = await import("./debug.js");
    debugLog("ignored");
    expect(existsSync(join(home, ".local"))).toBe(false);
  });

  it("appends timestamped lines when enabled", async () => {
    vi.stubEnv("STREAMTAB_DEBUG", "1");
    const { debugLog } = await import("./debug.js");
    debugLog("layout reset");
    debugLog("aggregate shrink");
    const log = readFileSync(join(home, ".local", "share", "streamtab", "debug.log"), "utf8");
    const lines = log.trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] layout reset$/);
    expect(lines[1]).toMatch(/\] aggregate shrink$/);
  });
});
