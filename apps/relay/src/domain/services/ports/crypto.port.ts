import type { DecryptionKey } from '@pbr/domain';

export interface EncryptedEnvelope {
  readonly nonce: Buffer;
  readonly tag: Buffer;
  readonly ciphertext: Buffer;
}

export interface CryptoServicePort {
  deriveKey(secret: string, salt: string): DecryptionKey;
  decrypt(key: DecryptionKey, ciphertext: Buffer, nonce: Buffer, tag: Buffer): Buffer;
  parseEnvelope(payload: Buffer): EncryptedEnvelope;
  /** Decrypts an envelope and parses the plaintext as JSON. */
  openEnvelope(key: DecryptionKey, payload: Buffer): unknown;
}
