/**
 * Core domain types for the ingestion pipeline.
 *
 * These types describe events exactly as they travel on the wire:
 * snake_case keys, timestamps as RFC 3339 strings. They carry no
 * framework dependencies.
 */

/** The three event kinds accepted by the ingestion endpoints. */
export const EVENT_KINDS = ['movie', 'user', 'payment'] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export interface MovieEvent {
  readonly movie_id: number;
  readonly title: string;
  /** Free-form, not checked against a list of known actions. */
  readonly action: string;
  readonly user_id: number;
}

/**
 * `timestamp` is set by the caller; the service never stamps events itself.
 */
export interface UserEvent {
  readonly user_id: number;
  readonly username: string;
  readonly action: string;
  readonly timestamp: string;
}

export interface PaymentEvent {
  readonly payment_id: number;
  readonly user_id: number;
  /** No sign or range check. */
  readonly amount: number;
  readonly status: string;
  readonly timestamp: string;
}

/** Maps each kind to its payload shape. */
interface EventByKind {
  movie: MovieEvent;
  user: UserEvent;
  payment: PaymentEvent;
}

export type DomainEvent = EventByKind[EventKind];
