import {createExtensionKey} from '@lattice/http';

export type Capture = {
  readonly key: string;
  /** Raw segment text, possibly percent-encoded. */
  readonly value: string;
};

/** View handed to extractors; extraction only ever reads captures. */
export interface ReadonlyCaptureStore extends Iterable<Capture> {
  readonly size: number;
  get(key: string): string | undefined;
  has(key: string): boolean;
  keys(): string[];
  entries(): Capture[];
}

/**
 * Ordered capture name to raw value mapping for one request. Order is the
 * order captures were first inserted, which positional shapes rely on.
 */
export class CaptureStore implements ReadonlyCaptureStore {
  private readonly values = new Map<string, string>();

  public static empty(): CaptureStore {
    return new CaptureStore();
  }

  public static from(entries: Iterable<readonly [string, string]>): CaptureStore {
    const store = new CaptureStore();
    for (const [key, value] of entries) {
      store.insert(key, value);
    }

    return store;
  }

  public get size(): number {
    return this.values.size;
  }

  public get(key: string): string | undefined {
    return this.values.get(key);
  }

  public has(key: string): boolean {
    return this.values.has(key);
  }

  public keys(): string[] {
    return [...this.values.keys()];
  }

  public entries(): Capture[] {
    return [...this];
  }

  /** A new key is appended; an existing key keeps its position and takes the new value. */
  public insert(key: string, value: string): this {
    this.values.set(key, value);
    return this;
  }

  /**
   * Folds captures contributed by a nested router into this store. Incoming
   * entries win on key collision, so the innermost router that matched last
   * decides the value.
   */
  public merge(incoming: ReadonlyCaptureStore): this {
    for (const {key, value} of incoming) {
      this.values.set(key, value);
    }

    return this;
  }

  public *[Symbol.iterator](): Iterator<Capture> {
    for (const [key, value] of this.values) {
      yield {key, value};
    }
  }
}

/** Extension slot the server fills with an empty store before dispatch. */
export const capturesKey = createExtensionKey<CaptureStore>('captures');
