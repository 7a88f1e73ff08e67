/**
 * Time source returning epoch milliseconds (UTC).
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
