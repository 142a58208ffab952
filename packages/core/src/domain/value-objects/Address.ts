import { getAddress, isAddress } from 'viem';

/**
 * Ethereum address value object.
 * Stored checksummed; compared case-insensitively.
 */
export class Address {
  private readonly _value: `0x${string}`;

  private constructor(value: `0x${string}`) {
    this._value = value;
  }

  /**
   * Create an Address from a string
   */
  static from(value: string): Address {
    if (!isAddress(value, { strict: false })) {
      throw new Error(`Invalid Ethereum address: ${value}`);
    }
    return new Address(getAddress(value));
  }

  /**
   * Create an Address from a string, returning null if invalid
   */
  static tryFrom(value: string): Address | null {
    if (!isAddress(value, { strict: false })) return null;
    return new Address(getAddress(value));
  }

  /**
   * Get the checksummed address
   */
  get value(): `0x${string}` {
    return this._value;
  }

  /**
   * Get the lowercase address, the form logs carry
   */
  get lowercase(): `0x${string}` {
    return `0x${this._value.slice(2).toLowerCase()}`;
  }

  equals(other: Address): boolean {
    return this.lowercase === other.lowercase;
  }

  /**
   * Check equality with a string; invalid strings never match
   */
  equalsString(other: string): boolean {
    const address = Address.tryFrom(other);
    return address !== null && this.equals(address);
  }

  toString(): string {
    return this._value;
  }
}
