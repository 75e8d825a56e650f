import dotenv from 'dotenv';

dotenv.config();

export interface QuotaSettings {
  dailyLimit: number;
  startHour: number;
  endHour: number;
  endMinute: number;
}

export interface RelaySettings {
  botToken: string;
  botUsername: string;
  adminIds: number[];
  port: number;
  quota: QuotaSettings;
  trialDays: number;
  retentionDays: number;
  /** IANA zone used for the active window and the quota day boundary. */
  timeZone: string;
  timeouts: {
    storeMs: number;
    transportMs: number;
  };
  footerText: string;
  jwtAdminSecret: string;
}

const intFromEnv = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
};

const idsFromEnv = (raw: string | undefined): number[] =>
  (raw ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => /^\d+$/.test(id))
    .map(Number);

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): RelaySettings => ({
  botToken: env.BOT_TOKEN || '',
  botUsername: env.BOT_USERNAME || 'tenantrelaybot',
  adminIds: idsFromEnv(env.ADMIN_IDS),
  port: intFromEnv(env, 'PORT', 3000),
  quota: {
    dailyLimit: intFromEnv(env, 'FREE_MODE_MESSAGE_LIMIT', 2),
    startHour: intFromEnv(env, 'FREE_MODE_START_HOUR', 9),
    endHour: intFromEnv(env, 'FREE_MODE_END_HOUR', 23),
    endMinute: intFromEnv(env, 'FREE_MODE_END_MINUTE', 50),
  },
  trialDays: intFromEnv(env, 'TRIAL_DAYS', 120),
  retentionDays: intFromEnv(env, 'MESSAGE_RETENTION_DAYS', 72),
  timeZone: env.RELAY_TIMEZONE || 'UTC',
  timeouts: {
    storeMs: intFromEnv(env, 'STORE_TIMEOUT_MS', 5000),
    transportMs: intFromEnv(env, 'TRANSPORT_TIMEOUT_MS', 10000),
  },
  footerText: env.FOOTER_TEXT || 'This bot was made using @tenantrelaybot',
  jwtAdminSecret: env.JWT_ADMIN_SECRET || '',
});

export const settings = loadSettings();
