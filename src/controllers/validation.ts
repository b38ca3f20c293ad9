import {
  isMemberRole,
  isTaskPriority,
  isTaskStatus,
  type MemberRole,
  type TaskPriority,
  type TaskStatus,
} from "../db/records.js";

export type Parsed<T> = ({ ok: true } & T) | { ok: false; error: string };

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const COLOR_RE = /^#[0-9a-f]{6}$/i;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const USERNAME_RE = /^[A-Za-z0-9_.-]{3,50}$/;

export const MIN_PASSWORD_LENGTH = 8;

export function parseId(value: string | string[] | undefined): string | null {
  const rawValue = Array.isArray(value) ? value[0] : value;
  if (typeof rawValue !== "string" || !UUID_RE.test(rawValue)) {
    return null;
  }
  return rawValue.toLowerCase();
}

export function isIdValue(value: unknown): value is string {
  return typeof value === "string" && UUID_RE.test(value);
}

/** `null` clears, a valid id sets, anything else is rejected as `undefined`. */
export function parseNullableId(value: unknown): string | null | undefined {
  if (value === null) return null;
  return isIdValue(value) ? value.toLowerCase() : undefined;
}

export function parseIdList(value: unknown): string[] | null {
  if (!Array.isArray(value) || !value.every(isIdValue)) {
    return null;
  }
  return value.map((id) => id.toLowerCase());
}

export function normalizeName(value: unknown, maxLength: number): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed.length > maxLength) return null;
  return trimmed;
}

export function isNullableStringPayload(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

export function normalizeDescription(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}

export function isColorPayload(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || (typeof value === "string" && COLOR_RE.test(value));
}

/** ISO date-time or `null`; returns `undefined` when the value is unusable. */
export function parseNullableDate(value: unknown): string | null | undefined {
  if (value === null) return null;
  if (typeof value !== "string") return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

/** Non-negative number of hours or `null`; `undefined` when unusable. */
export function parseNullableHours(value: unknown): number | null | undefined {
  if (value === null) return null;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) return undefined;
  return value;
}

export function parseStatus(value: unknown): TaskStatus | null {
  return isTaskStatus(value) ? value : null;
}

export function parsePriority(value: unknown): TaskPriority | null {
  return isTaskPriority(value) ? value : null;
}

export function parseMemberRole(value: unknown): MemberRole | null {
  return isMemberRole(value) ? value : null;
}

export function isEmail(value: unknown): value is string {
  return typeof value === "string" && EMAIL_RE.test(value);
}

export function isUsername(value: unknown): value is string {
  return typeof value === "string" && USERNAME_RE.test(value);
}

export function asRecord(body: unknown): Record<string, unknown> {
  return typeof body === "object" && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {};
}

export function has(payload: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(payload, key);
}

export function queryString(value: unknown): string | undefined {
  const rawValue = Array.isArray(value) ? value[0] : value;
  return typeof rawValue === "string" && rawValue.length > 0 ? rawValue : undefined;
}
