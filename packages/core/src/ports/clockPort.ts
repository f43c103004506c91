export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots (createRunContext, the CLI) should reach for this.
 * Everything else takes an injected clock so runs can be replayed.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * Clock frozen at a fixed instant
 */
export function createFixedClock(nowMs: number): ClockPort {
  return { nowMs: () => nowMs };
}
