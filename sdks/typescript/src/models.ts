import { z } from "zod";
import { ClientError } from "./errors";

export const LicenseSchema = z.object({
  tier: z.string(),
  price: z.number().int().nonnegative(),
  features: z.array(z.string()),
  expires: z.string(),
  valid: z.boolean().optional(),
});

export const UserSchema = z.object({
  user_id: z.string(),
  email: z.string(),
  role: z.string(),
  created: z.string(),
  two_fa_enabled: z.boolean(),
});

export const WebhookSchema = z.object({
  webhook_id: z.string(),
  url: z.string(),
  events: z.array(z.string()),
  created: z.string(),
  active: z.boolean(),
  failures: z.number().int().nonnegative().optional(),
});

export const SystemStatusSchema = z.object({
  status: z.string(),
  uptime_hours: z.number().int().nonnegative(),
  version: z.string(),
  editions: z.array(z.string()),
});

export const BackupSchema = z.object({
  backup_id: z.string(),
  schedule: z.string(),
  retention_days: z.number().int().nonnegative(),
  last_backup: z.string().nullable(),
  next_backup: z.string(),
  created: z.string(),
});

export type License = z.infer<typeof LicenseSchema>;
export type User = z.infer<typeof UserSchema>;
export type Webhook = z.infer<typeof WebhookSchema>;
export type SystemStatus = z.infer<typeof SystemStatusSchema>;
export type Backup = z.infer<typeof BackupSchema>;

/**
 * Parses a response body returned by the client and validates it against a record schema.
 * The client never calls this itself; response bodies are handed back untouched.
 */
export function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string): T {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new ClientError("deserialization", "Response body is not valid JSON", { cause: error });
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ClientError("deserialization", `Response body does not match the expected shape: ${detail}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export const decodeLicense = (text: string): License => decode(LicenseSchema, text);
export const decodeUser = (text: string): User => decode(UserSchema, text);
export const decodeWebhook = (text: string): Webhook => decode(WebhookSchema, text);
export const decodeSystemStatus = (text: string): SystemStatus => decode(SystemStatusSchema, text);
export const decodeBackup = (text: string): Backup => decode(BackupSchema, text);
