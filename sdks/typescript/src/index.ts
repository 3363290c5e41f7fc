export { AegisClient } from "./client";
export {
  ApiError,
  ClientError,
  ConfigurationError,
  InvalidBodyError,
  RateLimitedError,
  isClientError,
  isInvalidBody,
  isRateLimited,
} from "./errors";
export type { ErrorStage } from "./errors";
export { loadClientOptions } from "./config";
export type { ClientEnvironment } from "./config";
export { buildHeaders } from "./headers";
export type { RequestHeaders } from "./headers";
export { createJsonLogger, silentLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export {
  BackupSchema,
  LicenseSchema,
  SystemStatusSchema,
  UserSchema,
  WebhookSchema,
  decode,
  decodeBackup,
  decodeLicense,
  decodeSystemStatus,
  decodeUser,
  decodeWebhook,
} from "./models";
export type { Backup, License, SystemStatus, User, Webhook } from "./models";
export { operations, resolvePath } from "./operations";
export type { OperationDescriptor, OperationId } from "./operations";
export type {
  BackupScheduleRequest,
  ClientOptions,
  CredentialsRequest,
  HttpMethod,
  PaymentInitiateRequest,
  PaymentVerifyRequest,
  ValidateLicenseRequest,
  WebhookRegisterRequest,
} from "./types";
