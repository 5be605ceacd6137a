export type ChainTimeErrorMetadata = Record<string, string | number | null>;

/**
 * Error carrying a machine readable `code` plus metadata.
 */
export class ChainTimeError<T extends { code: string }> extends Error {
  readonly type: T;

  constructor(type: T, message?: string) {
    super(message ?? type.code);
    this.type = type;
    this.name = new.target.name;
  }

  get code(): T['code'] {
    return this.type.code;
  }

  getMetadata(): ChainTimeErrorMetadata {
    const metadata: ChainTimeErrorMetadata = {};
    for (const [key, value] of Object.entries(this.type)) {
      metadata[key] = typeof value === 'string' || typeof value === 'number' || value === null ? value : String(value);
    }
    return metadata;
  }
}
