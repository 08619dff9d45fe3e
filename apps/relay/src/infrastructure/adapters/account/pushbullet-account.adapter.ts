import { type AccessToken, AuthError, NotFoundError, ServiceUnavailableError } from '@pbr/domain';
import type {
  AccountPort,
  AccountUser,
  DeviceRecord,
  ListPushesOptions,
  PushPage,
} from '@pbr/relay/domain/services/ports/account.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import { z } from 'zod';

const log = createChildLogger('pushbullet-api');

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const userSchema = z.looseObject({
  iden: z.string().min(1),
  name: z.string().nullish(),
  email: z.string().nullish(),
});

const deviceSchema = z.looseObject({
  iden: z.string().min(1),
  active: z.boolean().default(true),
  nickname: z.string().nullish(),
  manufacturer: z.string().nullish(),
  model: z.string().nullish(),
});

const devicesResponseSchema = z.looseObject({
  devices: z.array(deviceSchema),
});

const pushesResponseSchema = z.looseObject({
  pushes: z.array(z.record(z.string(), z.unknown())),
  cursor: z.string().nullish(),
});

export interface PushbulletAccountOptions {
  baseUrl: string;
  accessToken: AccessToken;
  requestTimeoutMs: number;
}

export class PushbulletAccountAdapter implements AccountPort {
  private readonly baseUrl: string;

  constructor(private readonly options: PushbulletAccountOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async getCurrentUser(): Promise<AccountUser> {
    const user = await this.get('/users/me', userSchema);
    return {
      iden: user.iden,
      name: user.name ?? null,
      email: user.email ?? null,
    };
  }

  async listPushes(options: ListPushesOptions): Promise<PushPage> {
    const query: Record<string, string> = {};
    if (options.modifiedAfter !== undefined) {
      query.modified_after = String(options.modifiedAfter);
    }
    if (options.limit !== undefined) {
      query.limit = String(options.limit);
    }
    if (options.cursor) {
      query.cursor = options.cursor;
    }

    const page = await this.get('/pushes', pushesResponseSchema, query);
    return {
      pushes: page.pushes,
      cursor: page.cursor ?? null,
    };
  }

  async listDevices(): Promise<DeviceRecord[]> {
    const response = await this.get('/devices', devicesResponseSchema);
    return response.devices.map((device) => ({
      iden: device.iden,
      nickname: device.nickname ?? null,
      manufacturer: device.manufacturer ?? null,
      model: device.model ?? null,
      active: device.active,
    }));
  }

  private async get<T>(path: string, schema: z.ZodType<T>, query: Record<string, string> = {}): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          'Access-Token': this.options.accessToken.reveal(),
          Accept: 'application/json',
        },
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.requestTimeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new ServiceUnavailableError(`GET ${path} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`GET ${path} rejected the access token (HTTP ${response.status})`);
    }
    if (response.status === 404) {
      throw new NotFoundError(`GET ${path} returned 404`);
    }
    if (!response.ok) {
      throw new ServiceUnavailableError(`GET ${path} responded with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ServiceUnavailableError(`GET ${path} returned invalid JSON`, { cause: error });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      log.debug(`Unexpected ${path} payload: ${result.error.issues.map((issue) => issue.message).join('; ')}`);
      throw new ServiceUnavailableError(`GET ${path} returned an unexpected payload`);
    }

    return result.data;
  }
}
