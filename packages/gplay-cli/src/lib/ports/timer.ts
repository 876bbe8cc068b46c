/** Timer used for login and wait deadlines. */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

/** Sleep between polls; resolves immediately in tests. */
export type DelayFn = (ms: number) => Promise<void>;
