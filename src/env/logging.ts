// src/env/logging.ts
// Central logging helpers with a CI/test quiet mode gate.
import { shouldLogLevel, shouldLogTag } from './dev-log';

export function isQuietEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const ci = String(env.CI ?? '').toLowerCase();
  return ci === '1' || ci === 'true' || env.NODE_ENV === 'test';
}

/** Level-1 log: state transitions and notable events. */
export function debugLog(tag: string, message: string, payload?: unknown): void {
  if (!shouldLogLevel(1)) return;
  if (payload === undefined) console.log(`[${tag}] ${message}`);
  else console.log(`[${tag}] ${message}`, payload);
}

/** Level-2 probe, throttled per tag+message. */
export function traceLog(tag: string, message: string, payload?: unknown): void {
  if (!shouldLogTag(`${tag}:${message}`, 2, 250)) return;
  console.debug(`[${tag}] ${message}`, payload ?? '');
}

/** Warnings print at every level except under CI/tests, where an explicit level is needed. */
export function warnLog(tag: string, message: string, err?: unknown): void {
  if (isQuietEnv() && !shouldLogLevel(1)) return;
  console.warn(`[${tag}] ${message}`, err ?? '');
}
