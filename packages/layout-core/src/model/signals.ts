/**
 * Minimal typed signal bus. Dispatch is synchronous and runs over a copy of the listener set, so a
 * listener may unsubscribe itself; it must not mutate the model that is emitting.
 */
type Listener<Args extends readonly unknown[]> = (...args: Args) => void;

type SignalArgs<M> = { readonly [K in keyof M]: readonly unknown[] };

export interface SignalSubscriber<M extends SignalArgs<M>> {
  on<K extends keyof M>(signal: K, listener: Listener<M[K]>): () => void;
}

export interface SignalBus<M extends SignalArgs<M>> extends SignalSubscriber<M> {
  emit<K extends keyof M>(signal: K, ...args: M[K]): void;
  clear(): void;
}

export const createSignalBus = <M extends SignalArgs<M>>(): SignalBus<M> => {
  let listeners: { [K in keyof M]?: Set<Listener<M[K]>> } = {};

  const on = <K extends keyof M>(signal: K, listener: Listener<M[K]>): (() => void) => {
    const existing = listeners[signal];
    const set = existing ?? new Set<Listener<M[K]>>();
    if (!existing) {
      listeners[signal] = set;
    }
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  };

  const emit = <K extends keyof M>(signal: K, ...args: M[K]): void => {
    const set = listeners[signal];
    if (!set) {
      return;
    }
    [...set].forEach((listener) => listener(...args));
  };

  const clear = (): void => {
    listeners = {};
  };

  return { on, emit, clear };
};
