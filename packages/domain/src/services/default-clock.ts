import type { ClockPort } from '../ports/clock.port';

export class DefaultClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export function createDefaultClock(): ClockPort {
  return new DefaultClock();
}
