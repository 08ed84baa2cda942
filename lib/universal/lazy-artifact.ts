/**
 * A single cached value with an explicit two-state lifecycle.
 *
 * - `unset` → nothing computed yet (or explicitly reset)
 * - `computed` → holds the last value
 *
 * When constructed with `alwaysRefresh`, every `read()` demotes the artifact
 * back to `unset` first, so the value is recomputed on each access. That is
 * the only invalidation rule; accessors never decide freshness themselves.
 */
export type ArtifactState<T> =
  | { readonly status: "unset" }
  | { readonly status: "computed"; readonly value: T };

export class LazyArtifact<T> {
  #state: ArtifactState<T> = { status: "unset" };

  constructor(
    readonly alwaysRefresh = false,
    readonly compute?: () => T,
  ) {}

  get state(): ArtifactState<T> {
    return this.#state;
  }

  get isComputed() {
    return this.#state.status === "computed";
  }

  /**
   * Return the cached value, computing it with `compute` (or the
   * constructor's compute function) when unset or when always refreshing.
   */
  read(compute?: () => T): T {
    if (this.alwaysRefresh) this.reset();
    if (this.#state.status === "computed") return this.#state.value;
    const fn = compute ?? this.compute;
    if (!fn) {
      throw new Error("LazyArtifact has no value and no compute function");
    }
    return this.set(fn());
  }

  /** The cached value without computing, `undefined` when unset. */
  peek(): T | undefined {
    return this.#state.status === "computed" ? this.#state.value : undefined;
  }

  set(value: T): T {
    this.#state = { status: "computed", value };
    return value;
  }

  reset() {
    this.#state = { status: "unset" };
  }
}
