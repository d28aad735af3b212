/**
 * Client Configuration
 *
 * Connection, timeout and reconnect settings for the device client.
 * Every field can be overridden via environment variables (HTP1_*),
 * and every client constructor accepts the same fields as options.
 *
 * Usage:
 *   import { loadClientConfig } from '../config/client-config';
 *   const config = loadClientConfig();            // from process.env
 *   const config = loadClientConfig({ HTP1_MSO_TIMEOUT_MS: '2000' });
 *
 * Environment variable override:
 *   HTP1_RECONNECT_INITIAL_MS=1000  // First reconnect delay
 *   HTP1_DEBUG=true                 // Enable debug logging
 */

export interface ClientConfig {
  /** Device host name or address, e.g. `192.168.1.20` */
  host: string | undefined;
  /** First delay before retrying a failed connect */
  reconnectInitialDelayMs: number;
  /** Upper bound for the doubling reconnect delay */
  reconnectMaxDelayMs: number;
  /** Jitter factor as decimal, e.g. 0.25 = ±25% (0 keeps retries deterministic) */
  reconnectJitterFactor: number;
  /** How long connect() waits for the initial mso after requesting it */
  msoTimeoutMs: number;
  /** Websocket handshake timeout */
  connectTimeoutMs: number;
  /** Emit log/warn/debug output (errors are always logged) */
  debug: boolean;
}

export const DEFAULT_CLIENT_CONFIG: Readonly<Omit<ClientConfig, 'host'>> = {
  reconnectInitialDelayMs: 5_000,
  reconnectMaxDelayMs: 300_000,
  reconnectJitterFactor: 0,
  msoTimeoutMs: 5_000,
  connectTimeoutMs: 10_000,
  debug: false,
};

type Env = Record<string, string | undefined>;

/**
 * Parse a boolean environment variable
 * Returns defaultValue if not set, true if 'true'/'1', false otherwise
 */
export function parseEnvBool(envVar: string | undefined, defaultValue: boolean): boolean {
  if (envVar === undefined || envVar === '') {
    return defaultValue;
  }
  return envVar === 'true' || envVar === '1';
}

/**
 * Parse a non-negative numeric environment variable
 * Returns defaultValue if not set or not a finite number >= 0
 */
export function parseEnvNumber(envVar: string | undefined, defaultValue: number): number {
  if (envVar === undefined || envVar.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(envVar);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : defaultValue;
}

/**
 * Build a ClientConfig from environment variables.
 */
export function loadClientConfig(env: Env = process.env): ClientConfig {
  const reconnectInitialDelayMs = parseEnvNumber(
    env.HTP1_RECONNECT_INITIAL_MS,
    DEFAULT_CLIENT_CONFIG.reconnectInitialDelayMs
  );
  const reconnectMaxDelayMs = parseEnvNumber(
    env.HTP1_RECONNECT_MAX_MS,
    DEFAULT_CLIENT_CONFIG.reconnectMaxDelayMs
  );

  return {
    host: env.HTP1_HOST || undefined,
    reconnectInitialDelayMs,
    // The cap can never sit below the first delay
    reconnectMaxDelayMs: Math.max(reconnectMaxDelayMs, reconnectInitialDelayMs),
    reconnectJitterFactor: Math.min(
      parseEnvNumber(env.HTP1_RECONNECT_JITTER, DEFAULT_CLIENT_CONFIG.reconnectJitterFactor),
      1
    ),
    msoTimeoutMs: parseEnvNumber(env.HTP1_MSO_TIMEOUT_MS, DEFAULT_CLIENT_CONFIG.msoTimeoutMs),
    connectTimeoutMs: parseEnvNumber(
      env.HTP1_CONNECT_TIMEOUT_MS,
      DEFAULT_CLIENT_CONFIG.connectTimeoutMs
    ),
    debug: parseEnvBool(env.HTP1_DEBUG, env.NODE_ENV === 'development'),
  };
}

/**
 * Merge explicit options over the defaults.
 * Used by client constructors so that callers only name what they change.
 */
export function resolveClientConfig(
  options: Partial<Omit<ClientConfig, 'host' | 'debug'>> = {}
): Omit<ClientConfig, 'host' | 'debug'> {
  const merged = { ...DEFAULT_CLIENT_CONFIG, ...options };
  return {
    reconnectInitialDelayMs: merged.reconnectInitialDelayMs,
    reconnectMaxDelayMs: Math.max(merged.reconnectMaxDelayMs, merged.reconnectInitialDelayMs),
    reconnectJitterFactor: merged.reconnectJitterFactor,
    msoTimeoutMs: merged.msoTimeoutMs,
    connectTimeoutMs: merged.connectTimeoutMs,
  };
}
