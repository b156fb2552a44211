/**
 * backend/src/shared/clock.ts
 *
 * Injected wherever "now" decides an outcome (token expiry, refresh rotation),
 * so tests can move time without fake timers.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
