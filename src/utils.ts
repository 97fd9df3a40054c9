import pc from "picocolors";
import { LintGroup, LintLevel, Profile } from "./types";

export const VALID_GROUPS = new Set<LintGroup>([
  "cargo",
  "complexity",
  "correctness",
  "nursery",
  "pedantic",
  "perf",
  "restriction",
  "style",
  "suspicious",
  "deprecated"
]);

export const VALID_LEVELS = new Set<LintLevel>(["allow", "warn", "deny", "none"]);

export function isLintGroup(value: unknown): value is LintGroup {
  return typeof value === "string" && VALID_GROUPS.has(value as LintGroup);
}

export function isLintLevel(value: unknown): value is LintLevel {
  return typeof value === "string" && VALID_LEVELS.has(value as LintLevel);
}

export function isProfile(value: string): value is Profile {
  return value === "publish" || value === "personal";
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

export function debugLog(enabled: boolean, message: string): void {
  if (enabled) {
    process.stderr.write(`${pc.gray(`[debug] ${message}`)}\n`);
  }
}
