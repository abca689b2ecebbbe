/**
 * Port: wall clock. Domain code never reads `Date` directly.
 */
export interface TimeClockPort {
  /** Milliseconds since the Unix epoch. */
  nowMs(): number;
}
