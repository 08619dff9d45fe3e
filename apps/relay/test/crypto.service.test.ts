import { createCipheriv, pbkdf2Sync } from 'node:crypto';
import { DecryptionError, DecryptionKey } from '@pbr/domain';
import { AesGcmCryptoService } from '@pbr/relay/domain/services/crypto.service';
import { describe, expect, it } from 'vitest';

const NONCE = Buffer.from('000102030405060708090a0b', 'hex');

function seal(key: Buffer, plaintext: string): Buffer {
  const cipher = createCipheriv('aes-256-gcm', key, NONCE);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([Buffer.from('1'), cipher.getAuthTag(), NONCE, ciphertext]);
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('AesGcmCryptoService', () => {
  const crypto = new AesGcmCryptoService();
  const rawKey = pbkdf2Sync('test-secret', 'user-iden', 30_000, 32, 'sha256');

  it('derives the key with PBKDF2-SHA256 salted by the user iden', () => {
    const key = crypto.deriveKey('test-secret', 'user-iden');

    expect(key.length).toBe(32);
    expect(key.bytes().equals(rawKey)).toBe(true);
    expect(crypto.deriveKey('other-secret', 'user-iden').bytes().equals(rawKey)).toBe(false);
  });

  it('opens a sealed envelope', () => {
    const key = crypto.deriveKey('test-secret', 'user-iden');
    const payload = seal(rawKey, JSON.stringify({ type: 'mirror', title: 'Hi' }));

    expect(crypto.openEnvelope(key, payload)).toEqual({ type: 'mirror', title: 'Hi' });
  });

  it('splits the envelope into tag, nonce and ciphertext', () => {
    const payload = seal(rawKey, 'hello');
    const envelope = crypto.parseEnvelope(payload);

    expect(envelope.nonce.equals(NONCE)).toBe(true);
    expect(envelope.tag.length).toBe(16);
    expect(envelope.ciphertext.length).toBe(5);
  });

  it('detects a tampered ciphertext', () => {
    const key = crypto.deriveKey('test-secret', 'user-iden');
    const payload = seal(rawKey, JSON.stringify({ type: 'mirror' }));
    payload[payload.length - 1] ^= 0x01;

    const error = captureError(() => crypto.openEnvelope(key, payload));
    expect(error).toBeInstanceOf(DecryptionError);
    expect(error).toMatchObject({ reason: 'authentication-failed' });
  });

  it('fails authentication with the wrong password', () => {
    const wrongKey = crypto.deriveKey('wrong-secret', 'user-iden');
    const payload = seal(rawKey, '{}');

    expect(captureError(() => crypto.openEnvelope(wrongKey, payload))).toMatchObject({
      reason: 'authentication-failed',
    });
  });

  it('rejects keys of the wrong size', () => {
    const shortKey = DecryptionKey.fromBytes(Buffer.alloc(16));
    const envelope = crypto.parseEnvelope(seal(rawKey, '{}'));

    expect(
      captureError(() => crypto.decrypt(shortKey, envelope.ciphertext, envelope.nonce, envelope.tag)),
    ).toMatchObject({ reason: 'bad-key' });
  });

  it('rejects malformed envelopes', () => {
    const key = crypto.deriveKey('test-secret', 'user-iden');
    const wrongVersion = seal(rawKey, '{}');
    wrongVersion[0] = 0x32;

    expect(captureError(() => crypto.openEnvelope(key, wrongVersion))).toMatchObject({ reason: 'bad-envelope' });
    expect(captureError(() => crypto.openEnvelope(key, Buffer.from('1short')))).toMatchObject({
      reason: 'bad-envelope',
    });
  });

  it('rejects plaintext that is not JSON', () => {
    const key = crypto.deriveKey('test-secret', 'user-iden');

    expect(captureError(() => crypto.openEnvelope(key, seal(rawKey, 'not json')))).toMatchObject({
      reason: 'bad-envelope',
    });
  });
});
