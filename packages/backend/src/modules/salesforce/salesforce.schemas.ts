import { z } from 'zod';

// Shapes of the Salesforce response bodies the client reads.

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  instance_url: z.string().url().optional(),
  issued_at: z.string().optional(),
  token_type: z.string().optional(),
});

export const apiErrorSchema = z.object({
  message: z.string().default(''),
  errorCode: z.string(),
  fields: z.array(z.string()).optional(),
});

export const apiErrorListSchema = z.array(apiErrorSchema);

export type ApiError = z.infer<typeof apiErrorSchema>;

export const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const createResponseSchema = z
  .object({
    id: z.string().min(1),
  })
  .catchall(z.unknown());

export const remoteRecordSchema = z.record(z.unknown());

export const queryResponseSchema = z.object({
  totalSize: z.number().int().nonnegative(),
  done: z.boolean(),
  nextRecordsUrl: z.string().optional(),
  records: z.array(remoteRecordSchema),
});

export const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});
