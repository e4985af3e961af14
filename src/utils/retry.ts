import { errorMessage } from './logger';

export interface RetryOptions {
  tries?: number;
  baseMs?: number;
  maxMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function isTransientHttpError(error: unknown): boolean {
  const msg = errorMessage(error);
  const is429 =
    msg.includes(' 429 ') ||
    msg.includes('"code": "429"') ||
    msg.toLowerCase().includes('too many requests');
  const is5xx =
    msg.includes(' 500 ') ||
    msg.includes(' 502 ') ||
    msg.includes(' 503 ') ||
    msg.includes(' 504 ');
  return is429 || is5xx;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const tries = opts?.tries ?? 6;
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 8000;
  const shouldRetry = opts?.shouldRetry ?? isTransientHttpError;
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!shouldRetry(e) || i === tries - 1) {
        throw e;
      }
      const jitter = baseMs > 0 ? Math.floor(Math.random() * 250) : 0;
      const delay = Math.min(maxMs, baseMs * Math.pow(2, i)) + jitter;
      opts?.onRetry?.(e, i + 1, delay);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastErr;
}
