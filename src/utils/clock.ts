/** Source of the current time in epoch milliseconds. Injected so loops and stores can be tested. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
