export class NotificationKey {
  private constructor(private readonly _value: string) {}

  get value(): string {
    return this._value;
  }

  static forPush(iden: string): NotificationKey {
    if (iden.length === 0) {
      throw new Error('Push iden cannot be empty');
    }
    return new NotificationKey(`push:${iden}`);
  }

  /**
   * Mirrors and their dismissals share this key. Dismissal frames do not carry
   * the source device, so the device is not part of it.
   */
  static forMirror(appPackage: string, notificationId: string, notificationTag: string | null): NotificationKey {
    if (appPackage.length === 0) {
      throw new Error('Package name cannot be empty');
    }
    return new NotificationKey(`mirror:${appPackage}:${notificationId}:${notificationTag ?? ''}`);
  }

  equals(other: NotificationKey): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
