import { log } from "@/logger";

export function parseJsonOrString(str: string): unknown {
  try {
    return JSON.parse(str);
  } catch {
    log.debug({ raw: str }, "JSON parse failed, using raw string");
    return str;
  }
}

/** Gamma encodes some list fields as JSON inside a string; accept either form. */
export function parseJsonList(value: string | readonly unknown[] | null | undefined): unknown[] {
  if (value === null || value === undefined) return [];
  if (typeof value !== "string") return [...value];
  const parsed = parseJsonOrString(value);
  return Array.isArray(parsed) ? parsed : [];
}
