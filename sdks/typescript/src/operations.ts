import { ClientError } from "./errors";
import type { HttpMethod } from "./types";

export interface OperationDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly operationId: string;
  readonly summary: string;
}

export const operations = {
  validateLicense: {
    method: "POST",
    path: "/api/v1/license/validate",
    operationId: "validateLicense",
    summary: "Validate a license key",
  },
  getLicenseStatus: {
    method: "GET",
    path: "/api/v1/license/check",
    operationId: "getLicenseStatus",
    summary: "Current license status",
  },
  getTiers: {
    method: "GET",
    path: "/api/v1/tiers",
    operationId: "getTiers",
    summary: "List available tiers",
  },
  getTier: {
    method: "GET",
    path: "/api/v1/tier/{tierName}",
    operationId: "getTier",
    summary: "Details of a single tier",
  },
  initiatePayment: {
    method: "POST",
    path: "/api/v1/payment/initiate",
    operationId: "initiatePayment",
    summary: "Start a payment for a tier",
  },
  verifyPayment: {
    method: "POST",
    path: "/api/v1/payment/verify",
    operationId: "verifyPayment",
    summary: "Verify a payment and issue a license",
  },
  register: {
    method: "POST",
    path: "/api/v1/auth/register",
    operationId: "register",
    summary: "Register a new user",
  },
  login: {
    method: "POST",
    path: "/api/v1/auth/login",
    operationId: "login",
    summary: "Log a user in",
  },
  getProfile: {
    method: "GET",
    path: "/api/v1/user/profile",
    operationId: "getProfile",
    summary: "Profile of the configured user",
  },
  enableTwoFactor: {
    method: "POST",
    path: "/api/v1/user/2fa/enable",
    operationId: "enableTwoFactor",
    summary: "Enable two-factor authentication",
  },
  getSecurityCheck: {
    method: "GET",
    path: "/api/v1/security/check",
    operationId: "getSecurityCheck",
    summary: "System security status",
  },
  registerWebhook: {
    method: "POST",
    path: "/api/v1/webhooks/register",
    operationId: "registerWebhook",
    summary: "Register a webhook",
  },
  listWebhooks: {
    method: "GET",
    path: "/api/v1/webhooks",
    operationId: "listWebhooks",
    summary: "List registered webhooks",
  },
  deleteWebhook: {
    method: "DELETE",
    path: "/api/v1/webhooks/{webhookId}",
    operationId: "deleteWebhook",
    summary: "Delete a webhook",
  },
  getAnalytics: {
    method: "GET",
    path: "/api/v1/analytics/dashboard",
    operationId: "getAnalytics",
    summary: "Analytics dashboard",
  },
  getAuditLog: {
    method: "GET",
    path: "/api/v1/analytics/audit?limit={limit}",
    operationId: "getAuditLog",
    summary: "Recent audit log entries",
  },
  scheduleBackup: {
    method: "POST",
    path: "/api/v1/backup/schedule",
    operationId: "scheduleBackup",
    summary: "Schedule automated backups",
  },
  listBackups: {
    method: "GET",
    path: "/api/v1/backup/list",
    operationId: "listBackups",
    summary: "List available backups",
  },
  listApps: {
    method: "GET",
    path: "/api/v1/marketplace/apps",
    operationId: "listApps",
    summary: "List marketplace apps",
  },
  installApp: {
    method: "POST",
    path: "/api/v1/marketplace/app/{appId}/install",
    operationId: "installApp",
    summary: "Install a marketplace app",
  },
  getSystemStatus: {
    method: "GET",
    path: "/api/v1/system/status",
    operationId: "getSystemStatus",
    summary: "System status",
  },
  getSystemHealth: {
    method: "GET",
    path: "/api/v1/system/health",
    operationId: "getSystemHealth",
    summary: "System health",
  },
  getRateLimit: {
    method: "GET",
    path: "/api/v1/rate-limit/status",
    operationId: "getRateLimit",
    summary: "Rate limit usage",
  },
} as const satisfies Record<string, OperationDescriptor>;

export type OperationId = keyof typeof operations;

/**
 * Substitutes `{name}` placeholders with percent-encoded values.
 */
export function resolvePath(path: string, params: Record<string, string | number> = {}): string {
  return path.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new ClientError("serialization", `Missing path parameter "${name}" for ${path}`);
    }
    return encodeURIComponent(String(value));
  });
}
