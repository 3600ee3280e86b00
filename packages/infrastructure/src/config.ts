import { z } from 'zod';
import { ConfigError } from './errors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const permitEnvSchema = z.object({
  PERMIT_AUTHORITY_URL: z.string().url(),
  PERMIT_DB_PATH: z.string().min(1).default(':memory:'),
  PERMIT_SYNC_INTERVAL_MS: positiveInt(2_000),
  PERMIT_PUSH_BATCH_SIZE: positiveInt(50),
  PERMIT_PULL_BATCH_SIZE: positiveInt(100),
  PERMIT_REQUEST_TIMEOUT_MS: positiveInt(10_000),
});

export type PermitConfig = Readonly<{
  authorityUrl: string;
  dbPath: string;
  syncIntervalMs: number;
  pushBatchSize: number;
  pullBatchSize: number;
  requestTimeoutMs: number;
}>;

/**
 * Read client settings from the environment. Empty strings count as unset
 * so `.env` files with blank entries fall back to the defaults.
 */
export const loadPermitConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env
): PermitConfig => {
  const input = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = permitEnvSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  return {
    authorityUrl: values.PERMIT_AUTHORITY_URL,
    dbPath: values.PERMIT_DB_PATH,
    syncIntervalMs: values.PERMIT_SYNC_INTERVAL_MS,
    pushBatchSize: values.PERMIT_PUSH_BATCH_SIZE,
    pullBatchSize: values.PERMIT_PULL_BATCH_SIZE,
    requestTimeoutMs: values.PERMIT_REQUEST_TIMEOUT_MS,
  };
};
