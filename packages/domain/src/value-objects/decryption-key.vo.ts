import { inspect } from 'node:util';

export const DECRYPTION_KEY_BYTES = 32;

/**
 * Symmetric key derived from the user's encryption password. Memory only;
 * never serialized.
 */
export class DecryptionKey {
  private constructor(private readonly _bytes: Buffer) {}

  static fromBytes(bytes: Uint8Array): DecryptionKey {
    return new DecryptionKey(Buffer.from(bytes));
  }

  get length(): number {
    return this._bytes.length;
  }

  bytes(): Buffer {
    return this._bytes;
  }

  /** Overwrites the key material. */
  destroy(): void {
    this._bytes.fill(0);
  }

  toString(): string {
    return '[redacted]';
  }

  toJSON(): string {
    return '[redacted]';
  }

  [inspect.custom](): string {
    return `DecryptionKey(${this._bytes.length} bytes, [redacted])`;
  }
}
