import fs from "fs";
import path from "path";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(file: string): string {
  return fs.readFileSync(file, "utf8");
}

export function writeText(file: string, data: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, data, "utf8");
}

export function isIdentifier(s: string): boolean {
  return IDENTIFIER.test(s);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Finds the first existing file among `candidates`, recording every path looked at. */
export function firstExisting(candidates: string[], tried: string[]): string | undefined {
  for (const c of candidates) {
    tried.push(c);
    if (fs.existsSync(c) && fs.statSync(c).isFile()) return c;
  }
  return undefined;
}
