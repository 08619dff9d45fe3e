// ============================================================================
// Container tokens
// ============================================================================

export const RELAY_CONFIG = 'RelayConfig';
export const CLOCK = 'Clock';
export const ACCESS_TOKEN = 'AccessToken';
export const ACCOUNT_PORT = 'AccountPort';
export const STREAM_TRANSPORT_PORT = 'StreamTransportPort';
export const CRYPTO_SERVICE = 'CryptoService';
export const BACKOFF_POLICY = 'BackoffPolicy';
export const NOTIFICATION_SINK_PORT = 'NotificationSinkPort';
export const DEDUP_STORE = 'DedupStore';
export const DEVICE_DIRECTORY = 'DeviceDirectory';
export const STREAM_SESSION = 'StreamSession';
export const HISTORY_SYNC = 'HistorySync';
export const NOTIFICATION_DISPATCHER = 'NotificationDispatcher';

// ============================================================================
// Runtime
// ============================================================================

export const ROOT_LOGGER_NAME = 'pbr';
export const STATS_LOG_INTERVAL_MS = 15 * 60 * 1000;
