/** Source of the current time. Injected wherever behaviour depends on it. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
