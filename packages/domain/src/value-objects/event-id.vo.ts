import { createHash } from 'node:crypto';

export class EventId {
  private constructor(private readonly _value: string) {}

  get value(): string {
    return this._value;
  }

  /** Pushes carry a service-assigned iden that survives reconnects and REST re-fetches. */
  static forPush(iden: string): EventId {
    if (iden.length === 0) {
      throw new Error('Push iden cannot be empty');
    }
    return new EventId(`push:${iden}`);
  }

  /**
   * Mirrors have no service id. The digest covers identity and content, so a
   * redelivered mirror maps to the same id and an edited one to a new id.
   */
  static forMirror(parts: {
    sourceDeviceId: string | null;
    appPackage: string;
    notificationId: string;
    notificationTag: string | null;
    title: string;
    body: string;
  }): EventId {
    const digest = createHash('sha256')
      .update(
        [
          parts.sourceDeviceId ?? '',
          parts.appPackage,
          parts.notificationId,
          parts.notificationTag ?? '',
          parts.title,
          parts.body,
        ].join('\u0000'),
      )
      .digest('hex');
    return new EventId(`mirror:${digest}`);
  }

  static forDismissal(notificationKey: string, receivedAt: number): EventId {
    return new EventId(`dismiss:${notificationKey}:${receivedAt}`);
  }

  static forDeviceState(receivedAt: number): EventId {
    return new EventId(`device:${receivedAt}`);
  }

  equals(other: EventId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
