import { NotificationDispatcher } from '@pbr/relay/application/use-cases/dispatch/notification-dispatcher';
import { HistorySync } from '@pbr/relay/application/use-cases/history-sync/history-sync';
import { AesGcmCryptoService } from '@pbr/relay/domain/services/crypto.service';
import { type DeviceDirectory, DeviceDirectoryService } from '@pbr/relay/domain/services/device-directory.service';
import type { AccountPort } from '@pbr/relay/domain/services/ports/account.port';
import type { CryptoServicePort } from '@pbr/relay/domain/services/ports/crypto.port';
import type { NotificationSinkPort } from '@pbr/relay/domain/services/ports/notification-sink.port';
import type { StreamTransportPort } from '@pbr/relay/domain/services/ports/stream-transport.port';
import { PushbulletAccountAdapter } from '@pbr/relay/infrastructure/adapters/account/pushbullet-account.adapter';
import { ConsoleNotificationSinkAdapter } from '@pbr/relay/infrastructure/adapters/notification/console-notification-sink.adapter';
import { DbusNotificationSinkAdapter } from '@pbr/relay/infrastructure/adapters/notification/dbus-notification-sink.adapter';
import { IconCache } from '@pbr/relay/infrastructure/adapters/notification/icon-cache';
import {
  type StreamSession,
  StreamSessionAdapter,
} from '@pbr/relay/infrastructure/adapters/stream/stream-session.adapter';
import { WsStreamTransportAdapter } from '@pbr/relay/infrastructure/adapters/stream/ws-stream-transport.adapter';
import {
  ACCESS_TOKEN,
  ACCOUNT_PORT,
  BACKOFF_POLICY,
  CLOCK,
  CRYPTO_SERVICE,
  DEDUP_STORE,
  DEVICE_DIRECTORY,
  HISTORY_SYNC,
  NOTIFICATION_DISPATCHER,
  NOTIFICATION_SINK_PORT,
  RELAY_CONFIG,
  STREAM_SESSION,
  STREAM_TRANSPORT_PORT,
} from '@pbr/relay/infrastructure/constants';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import type { ConfigSchema } from '@pbr/config';
import { AccessToken, BackoffPolicy, type ClockPort, createDefaultClock, DedupStore } from '@pbr/domain';
import { type Container, getGlobalContainer } from './container';

const log = createChildLogger('relay-registry');

export function relayModuleRegistry(config: ConfigSchema, container: Container = getGlobalContainer()): Container {
  // Ensure a clean container when re-initializing in the same process.
  container.clear();

  container.registerInstance(RELAY_CONFIG, config);
  container.registerInstance<ClockPort>(CLOCK, createDefaultClock());
  container.registerInstance(ACCESS_TOKEN, AccessToken.create(config.credentials.accessToken));

  // ============================================================================
  // Adapters
  // ============================================================================

  container.register<AccountPort>(
    ACCOUNT_PORT,
    () =>
      new PushbulletAccountAdapter({
        baseUrl: config.api.baseUrl,
        accessToken: container.resolve<AccessToken>(ACCESS_TOKEN),
        requestTimeoutMs: config.api.requestTimeoutMs,
      }),
  );

  container.register<StreamTransportPort>(
    STREAM_TRANSPORT_PORT,
    () =>
      new WsStreamTransportAdapter({
        url: config.stream.url,
        connectTimeoutMs: config.stream.connectTimeoutMs,
        frameQueueLimit: config.stream.frameQueueLimit,
      }),
  );

  container.register<NotificationSinkPort>(NOTIFICATION_SINK_PORT, () => {
    if (config.sink.driver === 'console') {
      log.info('Using console notification sink');
      return new ConsoleNotificationSinkAdapter();
    }
    return new DbusNotificationSinkAdapter({
      appName: config.sink.appName,
      iconPath: config.sink.iconPath,
      expireTimeoutMs: config.sink.expireTimeoutMs,
      iconCache: new IconCache(config.sink.iconCacheDir),
    });
  });

  // ============================================================================
  // Services
  // ============================================================================

  container.registerInstance<CryptoServicePort>(CRYPTO_SERVICE, new AesGcmCryptoService());
  container.registerInstance(BACKOFF_POLICY, new BackoffPolicy(config.backoff));

  container.register(
    DEDUP_STORE,
    () =>
      new DedupStore({
        maxEntries: config.dedup.maxEntries,
        retentionMs: config.dedup.retentionMs,
        clock: container.resolve<ClockPort>(CLOCK),
      }),
  );

  container.register<DeviceDirectory>(
    DEVICE_DIRECTORY,
    () => new DeviceDirectoryService(container.resolve<AccountPort>(ACCOUNT_PORT)),
  );

  container.register<StreamSession>(
    STREAM_SESSION,
    () =>
      new StreamSessionAdapter({
        transport: container.resolve<StreamTransportPort>(STREAM_TRANSPORT_PORT),
        account: container.resolve<AccountPort>(ACCOUNT_PORT),
        crypto: container.resolve<CryptoServicePort>(CRYPTO_SERVICE),
        backoff: container.resolve<BackoffPolicy>(BACKOFF_POLICY),
        clock: container.resolve<ClockPort>(CLOCK),
        heartbeatTimeoutMs: config.stream.heartbeatTimeoutMs,
      }),
  );

  container.register(
    HISTORY_SYNC,
    () =>
      new HistorySync({
        account: container.resolve<AccountPort>(ACCOUNT_PORT),
        clock: container.resolve<ClockPort>(CLOCK),
        pageSize: config.api.historyPageSize,
        maxPages: config.api.historyMaxPages,
      }),
  );

  container.register(
    NOTIFICATION_DISPATCHER,
    () =>
      new NotificationDispatcher({
        sink: container.resolve<NotificationSinkPort>(NOTIFICATION_SINK_PORT),
        store: container.resolve<DedupStore>(DEDUP_STORE),
        devices: container.resolve<DeviceDirectory>(DEVICE_DIRECTORY),
      }),
  );

  return container;
}
