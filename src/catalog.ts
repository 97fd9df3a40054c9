import axios from "axios";
import { DecodeError, HttpError } from "./errors";
import { CatalogEntry } from "./types";
import { isLintGroup, isLintLevel } from "./utils";

export const DEFAULT_CATALOG_URL = "https://rust-lang.github.io/rust-clippy/stable/lints.json";

function assertString(value: unknown, fieldName: string, index: number): string {
  if (typeof value !== "string") {
    throw new DecodeError(`entry ${index}: "${fieldName}" must be a string`);
  }
  return value;
}

function decodeEntry(raw: unknown, index: number): CatalogEntry {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new DecodeError(`entry ${index} must be a JSON object`);
  }

  const obj = raw as Record<string, unknown>;
  const group = assertString(obj.group, "group", index);
  if (!isLintGroup(group)) {
    throw new DecodeError(`entry ${index}: unknown group "${group}"`);
  }
  const level = assertString(obj.level, "level", index);
  if (!isLintLevel(level)) {
    throw new DecodeError(`entry ${index}: unknown level "${level}"`);
  }

  return {
    id: assertString(obj.id, "id", index),
    group,
    default_level: level,
    version: assertString(obj.version, "version", index)
  };
}

export function decodeCatalog(raw: unknown): CatalogEntry[] {
  if (!Array.isArray(raw)) {
    throw new DecodeError("root must be a JSON array");
  }
  return raw.map((entry: unknown, index) => decodeEntry(entry, index));
}

export async function fetchCatalog(url: string, timeoutMs: number): Promise<CatalogEntry[]> {
  let data: unknown;
  try {
    const response = await axios.get<unknown>(url, {
      timeout: timeoutMs,
      responseType: "json"
    });
    data = response.data;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      throw new HttpError(url, error.message, error.response?.status);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new HttpError(url, message);
  }

  return decodeCatalog(data);
}
