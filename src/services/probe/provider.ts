/**
 * Resolves a hostname from many vantage points. Implementations may be slow
 * and may return partial results; callers do not retry.
 */
export interface ProbeProvider {
  readonly name: string;
  /** Location identifiers the provider can currently measure from. */
  locations(signal?: AbortSignal): Promise<string[]>;
  /** IP addresses `hostname` resolved to from the given locations. */
  resolve(
    hostname: string,
    locations: readonly string[],
    signal?: AbortSignal
  ): Promise<string[]>;
}
