import type { z } from 'zod';

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** A schema whose parsed output is `T`, whatever input it accepts. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface GlobalOptions {
  json?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
