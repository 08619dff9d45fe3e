export interface AccountUser {
  readonly iden: string;
  readonly name: string | null;
  readonly email: string | null;
}

export interface DeviceRecord {
  readonly iden: string;
  readonly nickname: string | null;
  readonly manufacturer: string | null;
  readonly model: string | null;
  readonly active: boolean;
}

/** Push object as served by the history API; validated by the decoders. */
export type PushRecord = Record<string, unknown>;

export interface PushPage {
  readonly pushes: PushRecord[];
  readonly cursor: string | null;
}

export interface ListPushesOptions {
  /** Epoch seconds, as the API expects. */
  modifiedAfter?: number;
  limit?: number;
  cursor?: string;
}

/**
 * REST side of the service. Implementations throw AuthError on 401/403,
 * NotFoundError on 404 and ServiceUnavailableError for anything else.
 */
export interface AccountPort {
  getCurrentUser(): Promise<AccountUser>;
  listPushes(options: ListPushesOptions): Promise<PushPage>;
  listDevices(): Promise<DeviceRecord[]>;
}
