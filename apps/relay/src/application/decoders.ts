import {
  EventId,
  MalformedFrameError,
  NotificationKey,
  type DismissNotificationEventData,
  type MirrorNotificationEventData,
  type PushEventData,
  type StreamEvent,
} from '@pbr/domain';
import type { RawFrame } from '@pbr/relay/domain/types/session';
import { z } from 'zod';

export const HEARTBEAT_FRAME_TYPE = 'nop';

export type DecodedFrame =
  | { readonly kind: 'heartbeat' }
  | { readonly kind: 'sync'; readonly receivedAt: number }
  | { readonly kind: 'event'; readonly event: StreamEvent }
  | { readonly kind: 'encrypted'; readonly payload: Buffer; readonly receivedAt: number }
  | { readonly kind: 'ignored'; readonly reason: string };

// ============================================================================
// Wire schemas
// ============================================================================

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const frameSchema = z.looseObject({
  type: z.string(),
});

const tickleFrameSchema = z.looseObject({
  type: z.literal('tickle'),
  subtype: z.string(),
});

const pushFrameSchema = z.looseObject({
  type: z.literal('push'),
  push: z.looseObject({ type: z.string().optional(), encrypted: z.boolean().optional() }),
});

const encryptedEphemeralSchema = z.looseObject({
  encrypted: z.literal(true),
  ciphertext: z.string().min(1),
});

const mirrorSchema = z.looseObject({
  type: z.literal('mirror'),
  package_name: z.string().min(1),
  notification_id: z.union([z.string(), z.number()]).transform(String),
  notification_tag: optionalText,
  title: z.string().default(''),
  body: z.string().default(''),
  application_name: optionalText,
  source_device_iden: optionalText,
  icon: optionalText,
  dismissible: z.boolean().default(true),
});

const dismissalSchema = z.looseObject({
  type: z.literal('dismissal'),
  package_name: z.string().min(1),
  notification_id: z.union([z.string(), z.number()]).transform(String),
  notification_tag: optionalText,
  source_device_iden: optionalText,
});

const pushRecordSchema = z.looseObject({
  iden: z.string().min(1),
  active: z.boolean().default(true),
  dismissed: z.boolean().default(false),
  modified: z.number(),
  created: z.number().optional(),
  type: z.enum(['note', 'link', 'file']),
  title: optionalText,
  body: optionalText,
  url: optionalText,
  file_name: optionalText,
  channel_iden: optionalText,
  receiver_iden: optionalText,
  sender_name: optionalText,
  source_device_iden: optionalText,
});

export type DecodedPushRecord = z.infer<typeof pushRecordSchema>;

// ============================================================================
// Stream frames
// ============================================================================

/**
 * Cheap check used by the session to keep keepalives out of the event path.
 */
export function isHeartbeatFrame(data: string): boolean {
  if (data.length > 64 || !data.includes(HEARTBEAT_FRAME_TYPE)) {
    return false;
  }
  try {
    const parsed = frameSchema.safeParse(JSON.parse(data));
    return parsed.success && parsed.data.type === HEARTBEAT_FRAME_TYPE;
  } catch {
    return false;
  }
}

export function decodeFrame(frame: RawFrame): DecodedFrame {
  let json: unknown;
  try {
    json = JSON.parse(frame.data);
  } catch (error) {
    throw new MalformedFrameError('Frame is not valid JSON', { cause: error });
  }

  const envelope = frameSchema.safeParse(json);
  if (!envelope.success) {
    throw new MalformedFrameError('Frame has no type discriminator');
  }

  switch (envelope.data.type) {
    case HEARTBEAT_FRAME_TYPE:
      return { kind: 'heartbeat' };
    case 'tickle':
      return decodeTickle(json, frame.receivedAt);
    case 'push':
      return decodePushFrame(json, frame.receivedAt);
    default:
      throw new MalformedFrameError(`Unknown frame type "${envelope.data.type}"`);
  }
}

function decodeTickle(json: unknown, receivedAt: number): DecodedFrame {
  const tickle = tickleFrameSchema.safeParse(json);
  if (!tickle.success) {
    throw new MalformedFrameError('Tickle frame is missing its subtype');
  }

  switch (tickle.data.subtype) {
    case 'push':
      return { kind: 'sync', receivedAt };
    case 'device':
      return {
        kind: 'event',
        event: {
          type: 'device-state',
          eventId: EventId.forDeviceState(receivedAt).value,
          sourceDeviceId: null,
          timestamp: receivedAt,
          encrypted: false,
          reason: 'device-list-changed',
        },
      };
    default:
      return { kind: 'ignored', reason: `tickle:${tickle.data.subtype}` };
  }
}

function decodePushFrame(json: unknown, receivedAt: number): DecodedFrame {
  const frame = pushFrameSchema.safeParse(json);
  if (!frame.success) {
    throw new MalformedFrameError('Push frame has no push object');
  }

  if (frame.data.push.encrypted === true) {
    const encrypted = encryptedEphemeralSchema.safeParse(frame.data.push);
    if (!encrypted.success) {
      throw new MalformedFrameError('Encrypted push has no ciphertext');
    }
    return { kind: 'encrypted', payload: Buffer.from(encrypted.data.ciphertext, 'base64'), receivedAt };
  }

  return decodeEphemeral(frame.data.push, { receivedAt, encrypted: false });
}

// ============================================================================
// Ephemerals (plain or decrypted)
// ============================================================================

/**
 * Turns an ephemeral object (the `push` member of a stream frame, or the
 * plaintext of an encrypted one) into a typed event.
 */
export function decodeEphemeral(
  ephemeral: unknown,
  options: { receivedAt: number; encrypted: boolean },
): DecodedFrame {
  const typed = frameSchema.safeParse(ephemeral);
  if (!typed.success) {
    throw new MalformedFrameError('Ephemeral has no type discriminator');
  }

  switch (typed.data.type) {
    case 'mirror':
      return { kind: 'event', event: decodeMirror(ephemeral, options) };
    case 'dismissal':
      return { kind: 'event', event: decodeDismissal(ephemeral, options) };
    default:
      return { kind: 'ignored', reason: `ephemeral:${typed.data.type}` };
  }
}

function decodeMirror(
  ephemeral: unknown,
  options: { receivedAt: number; encrypted: boolean },
): MirrorNotificationEventData {
  const parsed = mirrorSchema.safeParse(ephemeral);
  if (!parsed.success) {
    throw new MalformedFrameError(`Mirror is missing required fields: ${describeIssues(parsed.error.issues)}`);
  }
  const mirror = parsed.data;

  return {
    type: 'mirror',
    eventId: EventId.forMirror({
      sourceDeviceId: mirror.source_device_iden,
      appPackage: mirror.package_name,
      notificationId: mirror.notification_id,
      notificationTag: mirror.notification_tag,
      title: mirror.title,
      body: mirror.body,
    }).value,
    sourceDeviceId: mirror.source_device_iden,
    timestamp: options.receivedAt,
    encrypted: options.encrypted,
    notificationKey: NotificationKey.forMirror(mirror.package_name, mirror.notification_id, mirror.notification_tag)
      .value,
    appPackage: mirror.package_name,
    applicationName: mirror.application_name,
    title: mirror.title,
    body: mirror.body,
    iconBytes: mirror.icon ? Buffer.from(mirror.icon, 'base64') : null,
    dismissible: mirror.dismissible,
  };
}

function decodeDismissal(
  ephemeral: unknown,
  options: { receivedAt: number; encrypted: boolean },
): DismissNotificationEventData {
  const parsed = dismissalSchema.safeParse(ephemeral);
  if (!parsed.success) {
    throw new MalformedFrameError(`Dismissal is missing required fields: ${describeIssues(parsed.error.issues)}`);
  }
  const dismissal = parsed.data;
  const notificationKey = NotificationKey.forMirror(
    dismissal.package_name,
    dismissal.notification_id,
    dismissal.notification_tag,
  ).value;

  return {
    type: 'dismiss',
    eventId: EventId.forDismissal(notificationKey, options.receivedAt).value,
    sourceDeviceId: dismissal.source_device_iden,
    timestamp: options.receivedAt,
    encrypted: options.encrypted,
    notificationKey,
  };
}

// ============================================================================
// History records
// ============================================================================

/**
 * Maps a push from the history API. Deleted pushes yield null; pushes dismissed
 * elsewhere become a dismissal of their own render.
 */
export function decodePushRecord(record: unknown): PushEventData | DismissNotificationEventData | null {
  const parsed = pushRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new MalformedFrameError(`Push record is invalid: ${describeIssues(parsed.error.issues)}`);
  }
  const push = parsed.data;

  if (!push.active) {
    return null;
  }

  const timestamp = Math.round(push.modified * 1000);
  const notificationKey = NotificationKey.forPush(push.iden).value;

  if (push.dismissed) {
    return {
      type: 'dismiss',
      eventId: EventId.forDismissal(notificationKey, timestamp).value,
      sourceDeviceId: push.source_device_iden,
      timestamp,
      encrypted: false,
      notificationKey,
    };
  }

  return {
    type: 'push',
    eventId: EventId.forPush(push.iden).value,
    sourceDeviceId: push.source_device_iden,
    timestamp,
    encrypted: false,
    notificationKey,
    pushType: push.type,
    title: push.title,
    body: push.body ?? '',
    url: push.url,
    fileName: push.file_name,
    channelOrChatId: push.channel_iden ?? push.receiver_iden,
    senderName: push.sender_name,
  };
}

/** Reads `modified` (epoch seconds) without validating the rest of the record. */
export function readModified(record: unknown): number | null {
  const parsed = z.looseObject({ modified: z.number() }).safeParse(record);
  return parsed.success ? parsed.data.modified : null;
}

function describeIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): string {
  return issues
    .map((issue) => `${issue.path.map((segment) => String(segment)).join('.') || '<root>'} ${issue.message}`)
    .join('; ');
}
