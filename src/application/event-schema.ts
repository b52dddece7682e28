import { z } from 'zod';
import type { DomainEvent, EventKind } from '../domain/index.js';

/** Value a missing timestamp decodes to. */
export const ZERO_TIMESTAMP = '0001-01-01T00:00:00Z';

// A missing or null field takes its zero value; a field of the wrong type is rejected.
const int = z.number().int().safe().nullish().transform((v) => v ?? 0);
const float = z.number().nullish().transform((v) => v ?? 0);
const text = z.string().nullish().transform((v) => v ?? '');
const timestamp = z
  .string()
  .datetime({ offset: true, message: 'Must be an RFC 3339 date-time' })
  .nullish()
  .transform((v) => v ?? ZERO_TIMESTAMP);

/**
 * Zod schemas for the ingestion bodies.
 *
 * Unknown keys are stripped, so the re-serialized event only carries the
 * fields below, in this order. Values are not range-checked.
 */
const movieEventSchema = z.object({
  movie_id: int,
  title: text,
  action: text,
  user_id: int,
});

const userEventSchema = z.object({
  user_id: int,
  username: text,
  action: text,
  timestamp,
});

const paymentEventSchema = z.object({
  payment_id: int,
  user_id: int,
  amount: float,
  status: text,
  timestamp,
});

const schemas = {
  movie: movieEventSchema,
  user: userEventSchema,
  payment: paymentEventSchema,
} as const;

export interface DecodeIssue {
  readonly path: string;
  readonly message: string;
}

export type DecodeResult =
  | { readonly ok: true; readonly event: DomainEvent }
  | { readonly ok: false; readonly issues: readonly DecodeIssue[] };

/**
 * Decodes a raw request body into the event shape for `kind`.
 *
 * The body must be a JSON object; empty bodies, invalid JSON and
 * non-object values are rejected before schema validation.
 */
export function decodeEvent(kind: EventKind, raw: string): DecodeResult {
  if (raw.trim() === '') {
    return { ok: false, issues: [{ path: '', message: 'Request body is empty' }] };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : 'Malformed JSON';
    return { ok: false, issues: [{ path: '', message: `Invalid JSON: ${message}` }] };
  }

  const parsed = schemas[kind].safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return { ok: true, event: parsed.data };
}
