import { inspect } from 'node:util';

const REDACTED = '[redacted]';

/**
 * Account access token. Renders as `[redacted]` through toString, JSON and
 * util.inspect so it cannot leak into logs.
 */
export class AccessToken {
  private constructor(private readonly _value: string) {}

  static create(value: string): AccessToken {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      throw new Error('Access token cannot be empty');
    }
    if (/\s/.test(trimmed)) {
      throw new Error('Access token cannot contain whitespace');
    }
    return new AccessToken(trimmed);
  }

  reveal(): string {
    return this._value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `AccessToken(${REDACTED})`;
  }
}
