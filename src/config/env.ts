import path from 'node:path';
import dotenv from 'dotenv';

// MAILMIRROR_ENV_FILE points a daemon at a per-host file; variables already set win.
const envFilePath = path.resolve(process.cwd(), process.env.MAILMIRROR_ENV_FILE ?? '.env');
dotenv.config({ path: envFilePath, override: false });

const toNonNegativeInt = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  if (value === undefined || value === '' || !Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const optional = (value?: string) => (value ? value : undefined);

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  configPath: process.env.MAILMIRROR_CONFIG ?? path.resolve(process.cwd(), 'config', 'accounts.json'),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  metrics: {
    enabled: process.env.METRICS_ENABLED === 'true',
    port: toNonNegativeInt(process.env.METRICS_PORT, 9180),
    host: process.env.METRICS_HOST ?? '0.0.0.0',
  },
  sync: {
    idleFallbackMs: toNonNegativeInt(process.env.IDLE_FALLBACK_MS, 0),
  },
  mqtt: {
    url: optional(process.env.MQTT_URL),
    clientId: optional(process.env.MQTT_CLIENT_ID),
    username: optional(process.env.MQTT_USERNAME),
    password: optional(process.env.MQTT_PASSWORD),
  },
};
