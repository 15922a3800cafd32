export interface ReadonlyOptionMap {
  get(key: string): string | undefined;
  has(key: string): boolean;
  entries(): Array<[string, string]>;
  readonly size: number;
}

/**
 * String-keyed style options. `set` overrides, so a lookup always observes the
 * most recent write; `setDefault` and `extend` only fill keys that are absent.
 */
export class OptionMap implements ReadonlyOptionMap {
  private readonly values = new Map<string, string>();

  constructor(initial?: Readonly<Record<string, string>>) {
    if (initial) {
      this.assign(initial);
    }
  }

  get size(): number {
    return this.values.size;
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  setDefault(key: string, value: string): boolean {
    if (this.values.has(key)) {
      return false;
    }
    this.values.set(key, value);
    return true;
  }

  assign(attrs: Readonly<Record<string, string>>): void {
    for (const [key, value] of Object.entries(attrs)) {
      this.set(key, value);
    }
  }

  extend(attrs: Readonly<Record<string, string>>): void {
    for (const [key, value] of Object.entries(attrs)) {
      this.setDefault(key, value);
    }
  }

  entries(): Array<[string, string]> {
    return [...this.values.entries()];
  }
}
