import fs from "fs";

export type Status = 0 | 1;

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asStr(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return undefined;
}

export function asInt(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^\s*-?\d+\s*$/.test(v)) return Number(v);
  return undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export type StartFinishTimer = { finish(): number };

// Prints the message on start and again with the elapsed seconds on finish.
export function startFinishTimer(message: string, log: (line: string) => void = console.error): StartFinishTimer {
  const started = Date.now();
  log(message);
  return {
    finish() {
      const seconds = (Date.now() - started) / 1000;
      log(`${message} took ${seconds.toFixed(2)} seconds`);
      return seconds;
    },
  };
}
