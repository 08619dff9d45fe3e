import { inspect } from 'node:util';
import { describe, expect, it } from 'vitest';
import { AccessToken } from '../src/value-objects/access-token.vo';
import { DecryptionKey } from '../src/value-objects/decryption-key.vo';
import { EventId } from '../src/value-objects/event-id.vo';
import { NotificationKey } from '../src/value-objects/notification-key.vo';

const mirror = {
  sourceDeviceId: 'device-1',
  appPackage: 'com.example.chat',
  notificationId: '42',
  notificationTag: null,
  title: 'Alice',
  body: 'hello',
};

describe('EventId', () => {
  it('uses the push iden', () => {
    expect(EventId.forPush('ujpah72o0').value).toBe('push:ujpah72o0');
  });

  it('hashes mirrors deterministically', () => {
    const first = EventId.forMirror(mirror);
    const again = EventId.forMirror({ ...mirror });

    expect(first.value).toMatch(/^mirror:[0-9a-f]{64}$/);
    expect(first.equals(again)).toBe(true);
  });

  it('gives an edited mirror a new id', () => {
    expect(EventId.forMirror({ ...mirror, body: 'hello again' }).value).not.toBe(EventId.forMirror(mirror).value);
  });

  it('keeps field boundaries distinct', () => {
    const a = EventId.forMirror({ ...mirror, title: 'ab', body: 'c' });
    const b = EventId.forMirror({ ...mirror, title: 'a', body: 'bc' });
    expect(a.value).not.toBe(b.value);
  });
});

describe('NotificationKey', () => {
  it('builds push and mirror keys', () => {
    expect(NotificationKey.forPush('abc').value).toBe('push:abc');
    expect(NotificationKey.forMirror('com.example.chat', '42', null).value).toBe('mirror:com.example.chat:42:');
    expect(NotificationKey.forMirror('com.example.chat', '42', 'thread').value).toBe(
      'mirror:com.example.chat:42:thread',
    );
  });
});

describe('AccessToken', () => {
  it('never renders its value', () => {
    const token = AccessToken.create('  test-token  ');

    expect(token.reveal()).toBe('test-token');
    expect(String(token)).toBe('[redacted]');
    expect(JSON.stringify({ token })).toBe('{"token":"[redacted]"}');
    expect(inspect(token)).toBe('AccessToken([redacted])');
  });

  it('rejects empty tokens', () => {
    expect(() => AccessToken.create('   ')).toThrow('Access token cannot be empty');
    expect(() => AccessToken.create('a b')).toThrow('Access token cannot contain whitespace');
  });
});

describe('DecryptionKey', () => {
  it('zero-fills on destroy and stays redacted', () => {
    const key = DecryptionKey.fromBytes(Buffer.alloc(32, 7));

    expect(JSON.stringify({ key })).toBe('{"key":"[redacted]"}');
    key.destroy();
    expect(key.bytes().every((byte) => byte === 0)).toBe(true);
    expect(key.length).toBe(32);
  });
});
