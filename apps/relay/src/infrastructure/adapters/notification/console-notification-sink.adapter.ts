import type { NotificationContent, NotificationSinkPort } from '@pbr/relay/domain/services/ports/notification-sink.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';

const log = createChildLogger('console-sink');

/** Logs notifications instead of showing them. For headless hosts and dry runs. */
export class ConsoleNotificationSinkAdapter implements NotificationSinkPort {
  private nextId = 1;

  async create(content: NotificationContent): Promise<number> {
    const id = this.nextId++;
    log.info(`[#${id}] ${content.title}: ${content.body}`, { hasIcon: Boolean(content.icon?.length) });
    return id;
  }

  async update(notificationId: number, content: NotificationContent): Promise<number> {
    log.info(`[#${notificationId} updated] ${content.title}: ${content.body}`, { hasIcon: Boolean(content.icon?.length) });
    return notificationId;
  }

  async dismiss(notificationId: number): Promise<void> {
    log.info(`[#${notificationId} dismissed]`);
  }
}
