/** Current time in whole seconds. Injected so tests can pin it. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
