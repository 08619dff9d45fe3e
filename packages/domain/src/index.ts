// Events
export type {
  DeviceStateEventData,
  DismissNotificationEventData,
  MirrorNotificationEventData,
  PushEventData,
  PushType,
  StreamEvent,
  StreamEventType,
} from './events/stream-event';

// Errors
export type { DecryptionErrorReason, RelayErrorCode, TransportErrorReason } from './errors/relay-errors';
export {
  AuthError,
  DecryptionError,
  MalformedFrameError,
  NotFoundError,
  RelayError,
  ServiceUnavailableError,
  ShutdownError,
  SinkUnavailableError,
  TransportError,
} from './errors/relay-errors';

// Ports (Interfaces)
export type { ClockPort } from './ports/clock.port';

// Value Objects
export { AccessToken } from './value-objects/access-token.vo';
export { DECRYPTION_KEY_BYTES, DecryptionKey } from './value-objects/decryption-key.vo';
export { EventId } from './value-objects/event-id.vo';
export { NotificationKey } from './value-objects/notification-key.vo';

// Services
export type { BackoffOptions, BackoffState, ScheduledRetry } from './services/backoff-policy.service';
export { BackoffPolicy, INITIAL_BACKOFF_STATE } from './services/backoff-policy.service';
export type { DedupStoreOptions, DedupStoreStats } from './services/dedup-store.service';
export { DedupStore } from './services/dedup-store.service';
export { createDefaultClock, DefaultClock } from './services/default-clock';
