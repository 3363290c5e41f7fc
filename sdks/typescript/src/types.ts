import type { Logger } from "./logger";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface ClientOptions {
  baseUrl?: string;
  apiKey?: string;
  userId?: string;
  timeoutMs?: number;
  throwOnHttpError?: boolean;
  transport?: typeof fetch;
  logger?: Logger;
}

export interface ValidateLicenseRequest {
  key: string;
}

export interface PaymentInitiateRequest {
  tier: string;
  email: string;
}

export interface PaymentVerifyRequest {
  transaction_id: string;
  tier: string;
}

export interface CredentialsRequest {
  email: string;
  password: string;
}

export interface WebhookRegisterRequest {
  url: string;
  events: string[];
}

export interface BackupScheduleRequest {
  schedule: string;
  retention_days: number;
}
