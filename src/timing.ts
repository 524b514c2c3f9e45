/** The Dashboard API allows roughly 5 calls per second per organization. */
export const CALL_INTERVAL_MS = 200;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
