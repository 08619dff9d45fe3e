import { STATS_LOG_INTERVAL_MS } from '@pbr/relay/infrastructure/constants';
import { relayModuleRegistry } from '@pbr/relay/infrastructure/di/module-registry';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import { AuthError } from '@pbr/domain';
import { RelayBot, type RelayBotOptions } from './relay-bot';
import { RelayLoop } from './relay-loop';

const log = createChildLogger('core');

export class Core extends RelayBot {
  private controller: AbortController | null = null;
  private loop: RelayLoop | null = null;
  private runPromise: Promise<void> | null = null;
  private statsTimer: NodeJS.Timeout | null = null;

  constructor(options: RelayBotOptions = {}) {
    super(options);
  }

  /**
   * Starts the relay. The returned promise settles when the relay stops: it
   * resolves after `stop()` and rejects with AuthError when the token is refused.
   */
  start(): Promise<void> {
    if (this.runPromise) {
      log.warn('Relay already running');
      return this.runPromise;
    }

    log.info('Starting Pushbullet relay...', {
      stream: this.config.stream.url,
      sink: this.config.sink.driver,
    });

    relayModuleRegistry(this.config, this.container);

    const controller = new AbortController();
    const loop = new RelayLoop({
      session: this.getStreamSession(),
      dispatcher: this.getDispatcher(),
      history: this.getHistorySync(),
      crypto: this.getCryptoService(),
      credentials: this.getCredentials(),
    });
    this.controller = controller;
    this.loop = loop;

    this.statsTimer = setInterval(() => this.logStats(), STATS_LOG_INTERVAL_MS);
    this.statsTimer.unref();

    this.runPromise = loop
      .run(controller.signal)
      .catch((error: unknown) => {
        if (error instanceof AuthError) {
          log.fatal('Access token rejected; relay stopped', error);
        }
        throw error;
      })
      .finally(() => this.cleanup());

    return this.runPromise;
  }

  async stop(): Promise<void> {
    if (!this.controller || !this.runPromise) {
      return;
    }

    log.info('Stopping Pushbullet relay...');
    this.controller.abort();

    try {
      await this.runPromise;
    } catch (error) {
      log.debug(`Relay ended with ${error instanceof Error ? error.name : String(error)} while stopping`);
    }

    log.info('Pushbullet relay stopped');
  }

  private logStats(): void {
    if (!this.loop) {
      return;
    }
    log.info('Relay stats', { ...this.loop.getStats(), ...this.getDedupStore().getStats() });
  }

  private async cleanup(): Promise<void> {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }
    this.logStats();

    try {
      await this.getNotificationSink().close?.();
    } catch (error) {
      log.debug(`Failed to close notification sink: ${error instanceof Error ? error.message : String(error)}`);
    }

    this.loop = null;
    this.controller = null;
    this.runPromise = null;
  }
}
