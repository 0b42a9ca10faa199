/**
 * Multi-valued String Maps
 *
 * Ordered mapping from a key to a list of string values. Used for request
 * headers, parsed parameters, cookies and response headers.
 */

export type KeyNormalizer = (key: string) => string;

export type StringsMapInit = Iterable<[string, string | string[]]> | Record<string, string | string[]>;

function isPairs(init: StringsMapInit): init is Iterable<[string, string | string[]]> {
  return Symbol.iterator in init;
}

/**
 * Canonical header key: `content-type` becomes `Content-Type`
 */
export function canonicalHeaderKey(key: string): string {
  return key
    .toLowerCase()
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
}

/**
 * Ordered multi-valued string map
 */
export class StringsMap implements Iterable<[string, string[]]> {
  private _entries = new Map<string, string[]>();
  private normalize: KeyNormalizer;

  constructor(init?: StringsMapInit, normalize?: KeyNormalizer) {
    this.normalize = normalize ?? ((key) => key);
    if (init) {
      const pairs = isPairs(init) ? init : Object.entries(init);
      for (const [key, value] of pairs) {
        for (const v of Array.isArray(value) ? value : [value]) {
          this.append(key, v);
        }
      }
    }
  }

  /**
   * Create a map whose keys are canonical header keys
   */
  static headers(init?: StringsMapInit): StringsMap {
    return new StringsMap(init, canonicalHeaderKey);
  }

  /**
   * First value for the key
   */
  get(key: string): string | undefined {
    return this._entries.get(this.normalize(key))?.[0];
  }

  /**
   * First value for the key, or the default when absent
   */
  getDef(key: string, defaultValue: string): string {
    return this.get(key) ?? defaultValue;
  }

  /**
   * All values for the key, in insertion order
   */
  getAll(key: string): string[] {
    return [...(this._entries.get(this.normalize(key)) ?? [])];
  }

  has(key: string): boolean {
    return this._entries.has(this.normalize(key));
  }

  /**
   * Replace all values for the key with a single value
   */
  set(key: string, value: string): this {
    this._entries.set(this.normalize(key), [value]);
    return this;
  }

  append(key: string, value: string): this {
    const normalized = this.normalize(key);
    const values = this._entries.get(normalized);
    if (values) {
      values.push(value);
    } else {
      this._entries.set(normalized, [value]);
    }
    return this;
  }

  delete(key: string): boolean {
    return this._entries.delete(this.normalize(key));
  }

  /**
   * Append every value of another map
   */
  merge(other: StringsMap): this {
    for (const [key, values] of other) {
      for (const value of values) {
        this.append(key, value);
      }
    }
    return this;
  }

  get size(): number {
    return this._entries.size;
  }

  keys(): string[] {
    return [...this._entries.keys()];
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [key, values] of this._entries) {
      record[key] = [...values];
    }
    return record;
  }

  *[Symbol.iterator](): Iterator<[string, string[]]> {
    for (const [key, values] of this._entries) {
      yield [key, [...values]];
    }
  }
}
