import { delay } from './delay';

export async function retry<T>(fn: () => Promise<T>, attempts = 3, delayMs = 300): Promise<T> {
  let lastError: unknown = null;
  const total = Math.max(1, attempts);
  for (let i = 0; i < total; i++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      // exponential backoff, nothing to wait for after the last attempt
      if (i < total - 1) await delay(delayMs * Math.pow(2, i));
    }
  }
  throw lastError;
}
