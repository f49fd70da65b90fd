/**
 * Source of "now". Services take one so tests can pin time.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
