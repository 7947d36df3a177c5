/**
 * Purpose: Provide shared diagnostics, shape checks, and freezing helpers.
 * Intent: Keep message construction and object-safety conventions consistent across modules.
 */

import type { XsecMessage } from "./types.js";

type MessageExtra = Omit<XsecMessage, "severity" | "code" | "message">;

export const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);

export function err(messages: XsecMessage[], code: string, message: string, extra?: MessageExtra): void {
  messages.push({ severity: "error", code, message, ...(extra ?? {}) });
}

export function warn(messages: XsecMessage[], code: string, message: string, extra?: MessageExtra): void {
  messages.push({ severity: "warning", code, message, ...(extra ?? {}) });
}

export function info(messages: XsecMessage[], code: string, message: string, extra?: MessageExtra): void {
  messages.push({ severity: "info", code, message, ...(extra ?? {}) });
}

export function firstError(messages: readonly XsecMessage[]): XsecMessage | null {
  return messages.find((m) => m.severity === "error") ?? null;
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === "object" && !Array.isArray(v);
}

export function asString(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v : null;
}

export function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if (typeof value !== "object" || value === null || seen.has(value)) return value;
  seen.add(value);
  for (const child of Object.values(value)) deepFreeze(child, seen);
  Object.freeze(value);
  return value;
}
