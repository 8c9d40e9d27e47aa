import 'dotenv/config';
import { z } from 'zod';
import { ValidationError } from '../common/errors/app-error';
import { DEFAULT_TIMEOUT_MS } from '../infrastructure/youtu/youtu-json-client';
import { DEFAULT_HOST, YoutuClient } from '../modules/face/face.service';
import { Credential } from '../modules/signature/signature.credential';
import { UINT32_MAX, userIdSchema } from '../modules/signature/signature.validation';

export interface YoutuConfig {
  appId: number;
  secretId: string;
  secretKey: string;
  expired: number;
  userId: string;
  host: string;
  timeoutMs: number;
  debug: boolean;
}

// An empty variable counts as unset.
const blankAsUnset = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const optionalString = (fallback: string) => blankAsUnset.transform((value) => value ?? fallback);

const uint32 = z.coerce.number().int().min(0).max(UINT32_MAX);

const envSchema = z.object({
  YOUTU_APP_ID: z.string().trim().min(1).pipe(uint32),
  YOUTU_SECRET_ID: z.string().min(1),
  YOUTU_SECRET_KEY: z.string().min(1),
  YOUTU_EXPIRED: blankAsUnset.pipe(uint32.default(0)),
  YOUTU_USER_ID: blankAsUnset.pipe(userIdSchema.default('')),
  YOUTU_HOST: optionalString(DEFAULT_HOST),
  YOUTU_TIMEOUT_MS: blankAsUnset.pipe(z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)),
  YOUTU_DEBUG: z
    .string()
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): YoutuConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ValidationError('Invalid Youtu configuration', result.error.format());
  }

  const parsed = result.data;
  return {
    appId: parsed.YOUTU_APP_ID,
    secretId: parsed.YOUTU_SECRET_ID,
    secretKey: parsed.YOUTU_SECRET_KEY,
    expired: parsed.YOUTU_EXPIRED,
    userId: parsed.YOUTU_USER_ID,
    host: parsed.YOUTU_HOST,
    timeoutMs: parsed.YOUTU_TIMEOUT_MS,
    debug: parsed.YOUTU_DEBUG,
  };
}

export function createClientFromConfig(config: YoutuConfig): YoutuClient {
  const credential = new Credential({
    appId: config.appId,
    secretId: config.secretId,
    secretKey: config.secretKey,
    expired: config.expired,
    userId: config.userId,
  });
  return new YoutuClient(credential, config.host, { timeoutMs: config.timeoutMs, debug: config.debug });
}

export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): YoutuClient {
  return createClientFromConfig(loadConfig(env));
}
