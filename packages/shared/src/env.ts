import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Loads KEY=VALUE lines from `env.local` one directory above the calling module's directory.
// Variables already present in process.env win.
export function loadEnvLocal(moduleUrl: string): void {
  try {
    const dir = path.dirname(fileURLToPath(moduleUrl));
    const envPath = path.resolve(dir, "..", "env.local");
    if (!fs.existsSync(envPath)) return;
    const raw = fs.readFileSync(envPath, "utf8");
    for (const line of raw.split(/\r?\n/)) {
      const s = line.trim();
      if (!s || s.startsWith("#")) continue;
      const idx = s.indexOf("=");
      if (idx < 0) continue;
      const key = s.slice(0, idx).trim();
      const value = s.slice(idx + 1).trim();
      if (!key) continue;
      if (process.env[key] === undefined && value !== "") {
        process.env[key] = value;
      }
    }
  } catch (e) {
    console.error(JSON.stringify({ t: "env", evt: "env_local_unreadable", error: String(e) }));
  }
}

export function intFromEnv(value: string | undefined, fallback: number, bounds: { min: number; max: number }): number {
  const n = value === undefined || value.trim() === "" ? NaN : Number(value);
  if (!Number.isInteger(n) || n < bounds.min || n > bounds.max) return fallback;
  return n;
}
