// Tiny typed bus so the session talks to observers without globals
export type BusHandler<T = unknown> = (detail: T) => void;

class BusEvent<T> extends Event {
  constructor(type: string, readonly detail: T) {
    super(type);
  }
}

export interface Bus<Events extends object> {
  emit<K extends keyof Events & string>(type: K, detail: Events[K]): void;
  on<K extends keyof Events & string>(type: K, fn: BusHandler<Events[K]>): () => void;
}

export function createBus<Events extends object>(): Bus<Events> {
  const target = new EventTarget();

  function emit<K extends keyof Events & string>(type: K, detail: Events[K]): void {
    target.dispatchEvent(new BusEvent<Events[K]>(type, detail));
  }

  function on<K extends keyof Events & string>(type: K, fn: BusHandler<Events[K]>): () => void {
    const h = (e: Event): void => {
      if (!(e instanceof BusEvent)) return;
      try {
        fn(e.detail);
      } catch (err) {
        console.warn(`[bus] ${type} handler failed`, err);
      }
    };
    target.addEventListener(type, h);
    return () => target.removeEventListener(type, h);
  }

  return { emit, on };
}
