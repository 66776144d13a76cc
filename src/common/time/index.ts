export const CLOCK = 'CLOCK';

/**
 * # Source of "now"
 *
 * Injected wherever a decision depends on elapsed time, so cooldown and
 * staleness checks can be driven by a manual clock in tests.
 */
export interface Clock {
  now(): Date;
}

export class SystemClock implements Clock {
  // eslint-disable-next-line class-methods-use-this
  now(): Date {
    return new Date();
  }
}

export function secondsBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 1000;
}

export function secondsBefore(moment: Date, seconds: number): Date {
  return new Date(moment.getTime() - seconds * 1000);
}
