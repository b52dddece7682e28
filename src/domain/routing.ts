/** Upstream origins the gateway can forward to. */
export type Origin = 'monolith' | 'movies-service' | 'events-service';

/** Gradual migration settings for the movies capability. */
export interface MigrationSettings {
  readonly enabled: boolean;
  /** Share of movies traffic sent to movies-service, in [0,100]. */
  readonly percent: number;
}

/**
 * Outcome of classifying one request. Lives only for the duration of that request.
 */
export interface RoutingDecision {
  readonly path: string;
  readonly origin: Origin;
  /** Migration draw in [0,100), or null when no draw was made. */
  readonly roll: number | null;
}

/** Source of uniform integers, injected so routing can be made deterministic. */
export interface RandomSource {
  /** Returns an integer in [0, bound). */
  nextInt(bound: number): number;
}
