import type { HistorySync } from '@pbr/relay/application/use-cases/history-sync/history-sync';
import type { NotificationDispatcher } from '@pbr/relay/application/use-cases/dispatch/notification-dispatcher';
import type { CryptoServicePort } from '@pbr/relay/domain/services/ports/crypto.port';
import type { NotificationSinkPort } from '@pbr/relay/domain/services/ports/notification-sink.port';
import type { Credentials } from '@pbr/relay/domain/types/session';
import type { StreamSession } from '@pbr/relay/infrastructure/adapters/stream/stream-session.adapter';
import {
  ACCESS_TOKEN,
  CRYPTO_SERVICE,
  DEDUP_STORE,
  HISTORY_SYNC,
  NOTIFICATION_DISPATCHER,
  NOTIFICATION_SINK_PORT,
  STREAM_SESSION,
} from '@pbr/relay/infrastructure/constants';
import { type Container, getGlobalContainer } from '@pbr/relay/infrastructure/di/container';
import { configureRootLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import { type ConfigSchema, type LoadOptions, loadConfig } from '@pbr/config';
import type { AccessToken, DedupStore } from '@pbr/domain';

export interface RelayBotOptions extends LoadOptions {
  /** Forces the debug log level regardless of the configured one. */
  debug?: boolean;
}

export abstract class RelayBot {
  protected readonly container: Container;
  protected readonly config: ConfigSchema;

  constructor(options: RelayBotOptions = {}) {
    this.container = getGlobalContainer();
    const { config } = loadConfig(options);
    this.config = config;
    configureRootLogger({
      logLevel: options.debug ? 'debug' : config.telemetry.logLevel,
      traceErrors: config.telemetry.traceErrors,
    });
  }

  // ============================================================================
  // Credentials
  // ============================================================================

  protected getCredentials(): Credentials {
    return {
      accessToken: this.container.resolve<AccessToken>(ACCESS_TOKEN),
      encryptionPassword: this.config.credentials.encryptionPassword ?? null,
    };
  }

  // ============================================================================
  // Engine components
  // ============================================================================

  protected getStreamSession(): StreamSession {
    return this.container.resolve<StreamSession>(STREAM_SESSION);
  }

  protected getCryptoService(): CryptoServicePort {
    return this.container.resolve<CryptoServicePort>(CRYPTO_SERVICE);
  }

  protected getDispatcher(): NotificationDispatcher {
    return this.container.resolve<NotificationDispatcher>(NOTIFICATION_DISPATCHER);
  }

  protected getHistorySync(): HistorySync {
    return this.container.resolve<HistorySync>(HISTORY_SYNC);
  }

  protected getDedupStore(): DedupStore {
    return this.container.resolve<DedupStore>(DEDUP_STORE);
  }

  protected getNotificationSink(): NotificationSinkPort {
    return this.container.resolve<NotificationSinkPort>(NOTIFICATION_SINK_PORT);
  }
}
