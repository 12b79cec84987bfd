// packages/core/src/denormalize/document-builder.ts

/** Keys of T that may be left out. */
export type OptionalKeys<T> = {
  [K in keyof T]-?: undefined extends T[K] ? K : never;
}[keyof T];

export type RequiredFields<T> = Pick<T, Exclude<keyof T, OptionalKeys<T>>>;

/**
 * Builds a document that never carries null or undefined values: required
 * fields are given up front, optional ones are only inserted when present.
 */
export class SparseDocumentBuilder<T extends object> {
  private readonly optional: Partial<T> = {};

  constructor(private readonly required: RequiredFields<T>) {}

  set<K extends OptionalKeys<T> & keyof T>(key: K, value: T[K] | null | undefined): this {
    if (value !== null && value !== undefined) {
      this.optional[key] = value;
    }
    return this;
  }

  /** Number of optional fields set so far. */
  get optionalCount(): number {
    return Object.keys(this.optional).length;
  }

  build(): RequiredFields<T> & Partial<T> {
    return { ...this.optional, ...this.required };
  }
}
