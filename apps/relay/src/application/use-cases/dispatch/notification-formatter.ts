import type { MirrorNotificationEventData, PushEventData } from '@pbr/domain';
import type { NotificationContent } from '@pbr/relay/domain/services/ports/notification-sink.port';

/** `[Application] Title` with the mirrored body. */
export function formatMirror(event: MirrorNotificationEventData): NotificationContent {
  const app = event.applicationName?.trim() || event.appPackage;
  return {
    title: `[${app}] ${event.title.trim()}`.trim(),
    body: event.body.trim(),
    icon: event.iconBytes,
    persistent: !event.dismissible,
  };
}

/**
 * Untitled pushes are labelled with the sender, then the source device, then a
 * generic fallback.
 */
export function formatPush(event: PushEventData, deviceName: string | null): NotificationContent {
  const origin = event.senderName?.trim() || deviceName?.trim();
  const title = event.title?.trim() || (origin ? `Push from ${origin}` : 'New push');

  const lines = [event.body.trim()];
  if (event.pushType === 'link' && event.url) {
    lines.push(event.url);
  }
  if (event.pushType === 'file' && event.fileName) {
    lines.push(event.fileName);
  }

  return {
    title,
    body: lines.filter((line) => line.length > 0).join('\n'),
  };
}

/** True when the title has to be completed from the device directory. */
export function needsDeviceName(event: PushEventData): boolean {
  return !event.title?.trim() && !event.senderName?.trim() && event.sourceDeviceId !== null;
}
