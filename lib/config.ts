/**
 * Typed configuration for the synchronization core, validated with Zod.
 *
 * Hosts either pass an object to `parseConfig` or let `loadConfigFromEnv`
 * read `GODAIKIN_*` variables (`pollIntervalSeconds` is read from
 * `GODAIKIN_POLL_INTERVAL_SECONDS`, and so on).
 */
import { z } from 'zod';
import { ConfigurationError } from './godaikin/errors';
import { DEFAULT_API_BASE_URL, DEFAULT_COGNITO_CLIENT_ID, DEFAULT_REGION } from './godaikin/CloudApiClient';

export const ENV_PREFIX = 'GODAIKIN_';

/**
 * Environment values arrive as strings and z.coerce.boolean() treats "false"
 * as true.
 */
const flag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string().transform((value) => value.trim().toLowerCase() === 'true')])
    .default(defaultValue);

const seconds = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);
const millis = (defaultValue: number) => z.coerce.number().int().nonnegative().default(defaultValue);

export const ConfigSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),

  pollIntervalSeconds: seconds(7).describe('Cadence of the sync task'),
  staleAfterSeconds: seconds(300).describe('No successful sync for this long marks a device unavailable'),

  moldProofEnabled: flag(false).describe('Default for devices without their own override'),
  moldProofDurationSeconds: z.coerce.number().int().min(60).max(10800).default(3600),
  moldProofTickSeconds: seconds(30),

  commandRetryLimit: z.coerce.number().int().min(0).max(10).default(3),
  commandBackoffBaseMs: millis(500),
  confirmAttempts: z.coerce.number().int().min(1).max(10).default(3),
  confirmDelayMs: millis(2000),
  busyPolicy: z.enum(['queue', 'reject']).default('queue'),

  authTimeoutMs: millis(15000),
  pollTimeoutMs: millis(10000),
  commandTimeoutMs: millis(10000),
  sessionSafetyMarginSeconds: z.coerce.number().int().nonnegative().default(300),

  region: z.string().min(1).default(DEFAULT_REGION),
  cognitoClientId: z.string().min(1).default(DEFAULT_COGNITO_CLIENT_ID),
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),

  debug: flag(false),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  logPretty: flag(false),
});

export type CoreConfig = z.infer<typeof ConfigSchema>;
export type CoreConfigInput = z.input<typeof ConfigSchema>;

export function parseConfig(input: unknown): CoreConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function envKey(key: string): string {
  return ENV_PREFIX + key.replace(/([A-Z])/g, '_$1').toUpperCase();
}

/** Empty variables count as unset. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const input: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    const value = env[envKey(key)];
    if (value !== undefined && value.trim() !== '') {
      input[key] = value;
    }
  }
  return parseConfig(input);
}
