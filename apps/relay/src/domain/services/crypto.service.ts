import { createDecipheriv, pbkdf2Sync } from 'node:crypto';
import { DECRYPTION_KEY_BYTES, DecryptionError, DecryptionKey } from '@pbr/domain';
import type { CryptoServicePort, EncryptedEnvelope } from './ports/crypto.port';

export const PBKDF2_ITERATIONS = 30_000;
export const PBKDF2_DIGEST = 'sha256';

// Envelope layout: version (1) | tag (16) | nonce (12) | ciphertext
const ENVELOPE_VERSION = 0x31; // '1'
const TAG_BYTES = 16;
const NONCE_BYTES = 12;
const HEADER_BYTES = 1 + TAG_BYTES + NONCE_BYTES;
const CIPHER = 'aes-256-gcm';

export class AesGcmCryptoService implements CryptoServicePort {
  deriveKey(secret: string, salt: string): DecryptionKey {
    if (secret.length === 0) {
      throw new DecryptionError('bad-key', 'Encryption password cannot be empty');
    }
    const bytes = pbkdf2Sync(secret, salt, PBKDF2_ITERATIONS, DECRYPTION_KEY_BYTES, PBKDF2_DIGEST);
    return DecryptionKey.fromBytes(bytes);
  }

  decrypt(key: DecryptionKey, ciphertext: Buffer, nonce: Buffer, tag: Buffer): Buffer {
    if (key.length !== DECRYPTION_KEY_BYTES) {
      throw new DecryptionError('bad-key', `Decryption key must be ${DECRYPTION_KEY_BYTES} bytes, got ${key.length}`);
    }
    if (tag.length !== TAG_BYTES) {
      throw new DecryptionError('authentication-failed', `Authentication tag must be ${TAG_BYTES} bytes`);
    }

    try {
      const decipher = createDecipheriv(CIPHER, key.bytes(), nonce);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      // Wrong password and tampered data are indistinguishable here.
      throw new DecryptionError('authentication-failed', 'Unable to authenticate encrypted payload', {
        cause: error,
      });
    }
  }

  parseEnvelope(payload: Buffer): EncryptedEnvelope {
    if (payload.length <= HEADER_BYTES) {
      throw new DecryptionError('bad-envelope', `Encrypted payload too short (${payload.length} bytes)`);
    }
    if (payload[0] !== ENVELOPE_VERSION) {
      throw new DecryptionError('bad-envelope', `Unsupported encryption version 0x${payload[0]?.toString(16)}`);
    }

    return {
      tag: payload.subarray(1, 1 + TAG_BYTES),
      nonce: payload.subarray(1 + TAG_BYTES, HEADER_BYTES),
      ciphertext: payload.subarray(HEADER_BYTES),
    };
  }

  openEnvelope(key: DecryptionKey, payload: Buffer): unknown {
    const envelope = this.parseEnvelope(payload);
    const plaintext = this.decrypt(key, envelope.ciphertext, envelope.nonce, envelope.tag);
    try {
      return JSON.parse(plaintext.toString('utf8'));
    } catch (error) {
      throw new DecryptionError('bad-envelope', 'Decrypted payload is not valid JSON', { cause: error });
    } finally {
      plaintext.fill(0);
    }
  }
}
