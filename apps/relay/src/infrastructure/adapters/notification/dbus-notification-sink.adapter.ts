import { SinkUnavailableError } from '@pbr/domain';
import type { NotificationContent, NotificationSinkPort } from '@pbr/relay/domain/services/ports/notification-sink.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import dbus, { type Message, type MessageBus, type Variant } from 'dbus-next';
import type { IconCache } from './icon-cache';

const log = createChildLogger('dbus-sink');

const NOTIFICATIONS_NAME = 'org.freedesktop.Notifications';
const NOTIFICATIONS_PATH = '/org/freedesktop/Notifications';
const NOTIFY_SIGNATURE = 'susssasa{sv}i';
const NEVER_EXPIRE = 0;

export interface DbusNotificationSinkOptions {
  appName: string;
  /** Application icon shown when a notification carries no image of its own. */
  iconPath?: string;
  expireTimeoutMs: number;
  iconCache: IconCache;
  /** Defaults to the user's session bus. */
  busFactory?: () => MessageBus;
}

export class DbusNotificationSinkAdapter implements NotificationSinkPort {
  private bus: MessageBus | null = null;

  constructor(private readonly options: DbusNotificationSinkOptions) {}

  create(content: NotificationContent): Promise<number> {
    return this.notify(0, content);
  }

  update(notificationId: number, content: NotificationContent): Promise<number> {
    return this.notify(notificationId, content);
  }

  async dismiss(notificationId: number): Promise<void> {
    await this.call('CloseNotification', 'u', [notificationId]);
  }

  async close(): Promise<void> {
    if (this.bus) {
      this.bus.disconnect();
      this.bus = null;
    }
  }

  private async notify(replacesId: number, content: NotificationContent): Promise<number> {
    const hints: Record<string, Variant> = {};
    if (content.persistent) {
      hints.resident = new dbus.Variant('b', true);
    }
    if (content.icon && content.icon.length > 0) {
      try {
        const imagePath = await this.options.iconCache.store(content.icon);
        hints['image-path'] = new dbus.Variant('s', imagePath);
      } catch (error) {
        // Render without the image rather than not at all.
        log.warn(`Could not cache notification icon: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const reply = await this.call('Notify', NOTIFY_SIGNATURE, [
      this.options.appName,
      replacesId,
      this.options.iconPath ?? '',
      content.title,
      content.body,
      [],
      hints,
      content.persistent ? NEVER_EXPIRE : this.options.expireTimeoutMs,
    ]);

    const id: unknown = reply?.body[0];
    if (typeof id !== 'number') {
      throw new SinkUnavailableError('Notification server returned no notification id');
    }
    return id;
  }

  private async call(member: string, signature: string, body: unknown[]): Promise<Message | null> {
    const bus = this.getBus();
    const message = new dbus.Message({
      destination: NOTIFICATIONS_NAME,
      path: NOTIFICATIONS_PATH,
      interface: NOTIFICATIONS_NAME,
      member,
      signature,
      body,
    });

    try {
      return await bus.call(message);
    } catch (error) {
      throw new SinkUnavailableError(
        `${member} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private getBus(): MessageBus {
    if (this.bus) {
      return this.bus;
    }

    let bus: MessageBus;
    try {
      bus = this.options.busFactory ? this.options.busFactory() : dbus.sessionBus();
    } catch (error) {
      throw new SinkUnavailableError(
        `Session bus unavailable: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    bus.on('error', (error: Error) => {
      log.warn(`Session bus connection lost: ${error.message}`);
      if (this.bus === bus) {
        this.bus = null;
      }
    });
    this.bus = bus;
    return bus;
  }
}
