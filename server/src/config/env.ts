/**
 * Environment Configuration
 * Single typed view of process.env, parsed once at startup.
 *
 * Fails fast: an invalid variable throws ConfigError before the server binds.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().default('0.0.0.0'),
  ORDER_STORE: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: optionalString,
  REDIS_KEY_PREFIX: z.string().default('portal:'),
  LEASES_FILE: z.string().default('/var/lib/misc/dnsmasq.leases'),
  TRUST_REAL_IP_HEADER: booleanFlag(true),
  BUSINESS_TIMEZONE: optionalString,
  ORDER_STATUS_POLICY: z.enum(['unrestricted', 'forward-only']).default('unrestricted'),
  REQUIRE_MENU_ITEMS: booleanFlag(false),
  SEED_MENU: booleanFlag(true),
  CORS_ORIGIN: z.string().default('*')
});

export type StatusPolicyName = z.infer<typeof envSchema>['ORDER_STATUS_POLICY'];

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  orderStore: 'memory' | 'redis';
  redisUrl: string | undefined;
  redisKeyPrefix: string;
  leasesFile: string;
  trustRealIpHeader: boolean;
  businessTimeZone: string;
  statusPolicy: StatusPolicyName;
  requireMenuItems: boolean;
  seedMenu: boolean;
  corsOrigin: string;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a zone name against the ICU data Node ships with.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const env = parsed.data;

  if (env.ORDER_STORE === 'redis' && !env.REDIS_URL) {
    throw new ConfigError('REDIS_URL must be set when ORDER_STORE=redis', ['REDIS_URL: Required']);
  }

  const businessTimeZone = env.BUSINESS_TIMEZONE ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
  if (!isValidTimeZone(businessTimeZone)) {
    throw new ConfigError(`Unknown BUSINESS_TIMEZONE "${businessTimeZone}"`, ['BUSINESS_TIMEZONE: Invalid']);
  }

  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    orderStore: env.ORDER_STORE,
    redisUrl: env.REDIS_URL,
    redisKeyPrefix: env.REDIS_KEY_PREFIX,
    leasesFile: env.LEASES_FILE,
    trustRealIpHeader: env.TRUST_REAL_IP_HEADER,
    businessTimeZone,
    statusPolicy: env.ORDER_STATUS_POLICY,
    requireMenuItems: env.REQUIRE_MENU_ITEMS,
    seedMenu: env.SEED_MENU,
    corsOrigin: env.CORS_ORIGIN
  });
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}
