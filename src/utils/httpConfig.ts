import type { Application } from 'express';

export type TrustProxySetting = boolean | number | string[];

export function parseTrustProxy(
  rawValue: string | undefined,
): TrustProxySetting {
  if (!rawValue) return false;

  const trimmed = rawValue.trim();
  if (!trimmed) return false;

  const lower = trimmed.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  const hopCount = Number(trimmed);
  if (Number.isInteger(hopCount) && hopCount >= 0) return hopCount;

  return trimmed
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function applyTrustProxy(
  app: Application,
  trustProxy: TrustProxySetting,
): void {
  if (trustProxy === false) {
    return;
  }

  app.set('trust proxy', trustProxy);
}

export function parseBooleanEnv(name: string, fallback = false): boolean {
  const value = process.env[name];
  if (value == null) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return fallback;
}

export function readPositiveIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.floor(parsed);
}

/** Like readPositiveIntEnv but accepts 0 (used for "disabled"). */
export function readNonNegativeIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.floor(parsed);
}

export function readEnumEnv<T extends string>(
  name: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    console.warn(`[config] ${name}="${raw}" is not one of ${allowed.join(', ')}; using ${fallback}`);
    return fallback;
  }
  return match;
}

export function parseListEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parts = raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return parts.length ? parts : fallback;
}
