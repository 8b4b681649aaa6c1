/**
 * Source of the current time. Stores take one so tests can pin timestamps.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
