import * as dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  BOT_TOKEN: z.string().min(1),
  TELEGRAM_CHAT_ID: z.string().min(1),
  BYBIT_API_KEY: z.string().min(1),
  BYBIT_SECRET_KEY: z.string().min(1),
  BYBIT_TESTNET: booleanFlag,
  SYMBOL: z
    .string()
    .min(1)
    .transform(value => value.trim().toUpperCase()),
  TARGET_PROFIT_PERCENT: z.coerce.number().positive(),
  AMOUNT: z.coerce.number().positive(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  JOURNAL_PATH: z.string().min(1).default('/tmp/trading-bot.log'),
});

export interface AppConfig {
  readonly telegram: {
    readonly botToken: string;
    readonly chatId: string;
  };
  readonly bybit: {
    readonly key: string;
    readonly secret: string;
    readonly testnet: boolean;
  };
  readonly trading: {
    readonly symbol: string;
    readonly quantity: number;
    readonly targetProfitPercent: number;
  };
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
  readonly journalPath: string;
}

export class ConfigError extends Error {
  constructor(readonly keys: string[]) {
    super(`Invalid or missing env vars: ${keys.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    throw new ConfigError(keys);
  }

  const values = parsed.data;
  return Object.freeze({
    telegram: Object.freeze({ botToken: values.BOT_TOKEN, chatId: values.TELEGRAM_CHAT_ID }),
    bybit: Object.freeze({
      key: values.BYBIT_API_KEY,
      secret: values.BYBIT_SECRET_KEY,
      testnet: values.BYBIT_TESTNET,
    }),
    trading: Object.freeze({
      symbol: values.SYMBOL,
      quantity: values.AMOUNT,
      targetProfitPercent: values.TARGET_PROFIT_PERCENT,
    }),
    logLevel: values.LOG_LEVEL,
    journalPath: values.JOURNAL_PATH,
  });
}

let cached: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cached) return cached;
  dotenv.config();
  cached = parseConfig(process.env);
  return cached;
}
