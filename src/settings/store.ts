// src/settings/store.ts
// Typed reader settings store with simple subscribe/set/get API.
import { normalizeSettings, type ReaderSettings } from './schema';

type Subscriber = (next: ReaderSettings) => void;

export interface SettingsStore {
  get(): ReaderSettings;
  set(patch: Partial<ReaderSettings>): ReaderSettings;
  subscribe(fn: Subscriber): () => void;
}

export function createSettingsStore(initial: Partial<ReaderSettings> = {}): SettingsStore {
  let state = normalizeSettings(initial);
  const subs = new Set<Subscriber>();

  return {
    get(): ReaderSettings {
      return { ...state };
    },

    set(patch: Partial<ReaderSettings>): ReaderSettings {
      state = normalizeSettings({ ...state, ...patch });
      const snapshot = { ...state };
      for (const fn of subs) {
        try {
          fn(snapshot);
        } catch (err) {
          console.warn('[settings] subscriber failed', err);
        }
      }
      return snapshot;
    },

    subscribe(fn: Subscriber): () => void {
      subs.add(fn);
      return () => {
        subs.delete(fn);
      };
    },
  };
}
