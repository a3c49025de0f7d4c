/**
 * Typed token for one kind of request-scoped data. The key owns its slots, so
 * reading a value back never needs a type assertion.
 */
export type ExtensionKey<T> = {
  readonly name: string;
  readonly slots: WeakMap<Extensions, T>;
};

export const createExtensionKey = <T>(name: string): ExtensionKey<T> => ({
  name,
  slots: new WeakMap<Extensions, T>()
});

/** Per-request side table keyed by data kind. Owned by a single request worker. */
export class Extensions {
  public get<T>(key: ExtensionKey<T>): T | undefined {
    return key.slots.get(this);
  }

  public has<T>(key: ExtensionKey<T>): boolean {
    return key.slots.has(this);
  }

  public set<T>(key: ExtensionKey<T>, value: T): void {
    key.slots.set(this, value);
  }

  public remove<T>(key: ExtensionKey<T>): boolean {
    return key.slots.delete(this);
  }

  /**
   * Reads a value the pipeline guarantees to be present.
   *
   * @throws Error when nothing was installed under `key`. That is a wiring
   * mistake in the server, not a client error.
   */
  public require<T>(key: ExtensionKey<T>): T {
    const value = key.slots.get(this);
    if (value === undefined) {
      throw new Error(`Request extension \`${key.name}\` is not installed`);
    }

    return value;
  }
}
