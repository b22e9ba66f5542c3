/**
 * src/shared/time/clock.ts
 *
 * WHY:
 * - Expiry, idle timeout and TOTP windows all depend on "now".
 * - Injecting a Clock lets tests move time forward deterministically instead of
 *   sleeping or mocking Date globally.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
