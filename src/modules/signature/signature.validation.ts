import { z } from 'zod';

export const USER_ID_MAX_LENGTH = 110;
export const UINT32_MAX = 2 ** 32 - 1;

const uint32 = z.number().int().min(0).max(UINT32_MAX);

// The service limits the user id by its UTF-8 byte length.
export const userIdSchema = z
  .string()
  .refine((value) => Buffer.byteLength(value, 'utf8') <= USER_ID_MAX_LENGTH, {
    message: `userId must be at most ${USER_ID_MAX_LENGTH} bytes`,
  });

export const credentialSchema = z.object({
  appId: uint32,
  secretId: z.string(),
  secretKey: z.string(),
  expired: uint32.optional().transform((value) => value ?? 0),
  userId: userIdSchema
    .optional()
    .transform((value) => value ?? ''),
});

export type CredentialInput = z.input<typeof credentialSchema>;
