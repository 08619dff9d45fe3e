import {
  type DedupStore,
  type DismissNotificationEventData,
  type MirrorNotificationEventData,
  type PushEventData,
  SinkUnavailableError,
  type StreamEvent,
} from '@pbr/domain';
import type { DeviceDirectory } from '@pbr/relay/domain/services/device-directory.service';
import type {
  NotificationContent,
  NotificationSinkPort,
} from '@pbr/relay/domain/services/ports/notification-sink.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import { formatMirror, formatPush, needsDeviceName } from './notification-formatter';

const log = createChildLogger('dispatcher');

export type SkipReason = 'duplicate' | 'not-rendered' | 'device-state';

export type DispatchResult =
  | { readonly status: 'created'; readonly notificationKey: string; readonly notificationId: number }
  | { readonly status: 'updated'; readonly notificationKey: string; readonly notificationId: number }
  | { readonly status: 'dismissed'; readonly notificationKey: string; readonly notificationId: number }
  | { readonly status: 'skipped'; readonly reason: SkipReason }
  | { readonly status: 'failed'; readonly error: SinkUnavailableError };

export interface NotificationDispatcherDeps {
  sink: NotificationSinkPort;
  store: DedupStore;
  devices: DeviceDirectory;
}

/**
 * Turns stream events into idempotent sink actions. Callers await each dispatch
 * before the next one; the store is not safe for interleaved use.
 */
export class NotificationDispatcher {
  constructor(private readonly deps: NotificationDispatcherDeps) {}

  async dispatch(event: StreamEvent): Promise<DispatchResult> {
    switch (event.type) {
      case 'push':
        return this.dispatchPush(event);
      case 'mirror':
        return this.dispatchMirror(event);
      case 'dismiss':
        return this.dispatchDismiss(event);
      case 'device-state':
        this.deps.devices.invalidate();
        log.debug('Device list changed; directory cache invalidated');
        return { status: 'skipped', reason: 'device-state' };
    }
  }

  private async dispatchPush(event: PushEventData): Promise<DispatchResult> {
    if (!this.deps.store.admit(event.eventId)) {
      log.debug(`Duplicate push ${event.eventId} skipped`);
      return { status: 'skipped', reason: 'duplicate' };
    }

    const deviceName =
      needsDeviceName(event) && event.sourceDeviceId ? await this.deps.devices.describe(event.sourceDeviceId) : null;

    return this.render(event.notificationKey, formatPush(event, deviceName));
  }

  private async dispatchMirror(event: MirrorNotificationEventData): Promise<DispatchResult> {
    if (!this.deps.store.admit(event.eventId)) {
      log.debug(`Duplicate mirror ${event.eventId} skipped`);
      return { status: 'skipped', reason: 'duplicate' };
    }

    return this.render(event.notificationKey, formatMirror(event), event.eventId);
  }

  private async dispatchDismiss(event: DismissNotificationEventData): Promise<DispatchResult> {
    const notificationId = this.deps.store.lookupRendered(event.notificationKey);
    if (notificationId === null) {
      log.debug(`Dismissal for ${event.notificationKey} has no render; ignored`);
      return { status: 'skipped', reason: 'not-rendered' };
    }

    try {
      await this.deps.sink.dismiss(notificationId);
    } catch (error) {
      return this.sinkFailure(error, `dismiss ${event.notificationKey}`);
    }

    this.deps.store.forgetRendered(event.notificationKey);
    log.info(`Dismissed #${notificationId} (${event.notificationKey})`);
    return { status: 'dismissed', notificationKey: event.notificationKey, notificationId };
  }

  /**
   * A mirror's id is derived from its content, so it is handed to the store to be
   * released on dismissal; the phone may post identical content again.
   */
  private async render(
    notificationKey: string,
    content: NotificationContent,
    contentEventId?: string,
  ): Promise<DispatchResult> {
    const existing = this.deps.store.lookupRendered(notificationKey);

    let notificationId: number;
    try {
      notificationId =
        existing === null ? await this.deps.sink.create(content) : await this.deps.sink.update(existing, content);
    } catch (error) {
      return this.sinkFailure(error, `render ${notificationKey}`);
    }

    this.deps.store.recordRendered(notificationKey, notificationId, contentEventId);

    if (existing === null) {
      log.info(`Rendered #${notificationId}: ${content.title}`);
      return { status: 'created', notificationKey, notificationId };
    }
    log.info(`Updated #${notificationId}: ${content.title}`);
    return { status: 'updated', notificationKey, notificationId };
  }

  private sinkFailure(error: unknown, action: string): DispatchResult {
    if (!(error instanceof SinkUnavailableError)) {
      throw error;
    }
    log.warn(`Notification sink unavailable, could not ${action}: ${error.message}`);
    return { status: 'failed', error };
  }
}
