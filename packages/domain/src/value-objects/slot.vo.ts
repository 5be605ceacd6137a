export class Slot {
  private constructor(private readonly _value: bigint) {}

  get value(): bigint {
    return this._value;
  }

  static create(value: bigint | number): Slot {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new Error(`Slot value must be a safe integer, got ${value}`);
    }
    const slot = BigInt(value);
    if (slot < 0n) {
      throw new Error('Slot value cannot be negative');
    }
    return new Slot(slot);
  }

  equals(other: Slot): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return `Slot ${this._value.toString()}`;
  }
}
