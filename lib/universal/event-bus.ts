/**
 * Strongly-typed event bus on top of the platform `EventTarget` and
 * `CustomEvent` primitives.
 *
 * The event map `M` names every event and its payload ("detail") type. When a
 * detail type is `void` the listener takes no argument, otherwise exactly one.
 *
 * ```ts
 * type E = {
 *   "ready": void;
 *   "warning": { message: string };
 * };
 *
 * const bus = eventBus<E>();
 * const off = bus.on("warning", ({ message }) => console.warn(message));
 * bus.emit("warning", { message: "careful" });
 * off();
 * ```
 *
 * Delivery is synchronous (`dispatchEvent`), so a listener has run by the time
 * `emit` returns. A listener that returns a promise is not awaited.
 */
export function eventBus<M extends Record<string, unknown | void>>() {
  type Key = Extract<keyof M, string>;
  type Detail<K extends Key> = M[K];
  type Args<K extends Key> = Detail<K> extends void ? [] : [Detail<K>];
  type Listener<K extends Key> = (...args: Args<K>) => void | Promise<void>;

  const target = new EventTarget();
  const handlers = new Map<string, Map<unknown, EventListener>>();

  const handlersFor = (type: Key) => {
    let map = handlers.get(type);
    if (!map) {
      map = new Map();
      handlers.set(type, map);
    }
    return map;
  };

  const argsOf = <K extends Key>(ev: Event): Args<K> => {
    const detail = ev instanceof CustomEvent ? ev.detail : undefined;
    // the tuple shape is decided by M, not by the runtime value
    return (detail === undefined ? [] : [detail]) as Args<K>;
  };

  const api = {
    on<K extends Key>(type: K, listener: Listener<K>) {
      const map = handlersFor(type);
      if (map.has(listener)) return () => api.off(type, listener);
      const handler: EventListener = (ev) => {
        void listener(...argsOf<K>(ev));
      };
      map.set(listener, handler);
      target.addEventListener(type, handler);
      return () => api.off(type, listener);
    },

    off<K extends Key>(type: K, listener: Listener<K>) {
      const map = handlers.get(type);
      const handler = map?.get(listener);
      if (!map || !handler) return;
      target.removeEventListener(type, handler);
      map.delete(listener);
      if (map.size === 0) handlers.delete(type);
    },

    emit<K extends Key>(type: K, ...detail: Args<K>) {
      const d = (detail.length ? detail[0] : undefined) as Detail<K>;
      return target.dispatchEvent(new CustomEvent(type, { detail: d }));
    },

    listenerCount(type: Key) {
      return handlers.get(type)?.size ?? 0;
    },

    isObserved(type: Key) {
      return api.listenerCount(type) > 0;
    },
  } as const;

  return api;
}

export type EventBus<M extends Record<string, unknown | void>> = ReturnType<
  typeof eventBus<M>
>;
