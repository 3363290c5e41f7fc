import { ApiError, ClientError, InvalidBodyError, RateLimitedError } from "./errors";
import { loadClientOptions, type ClientEnvironment } from "./config";
import { buildHeaders } from "./headers";
import { silentLogger, type Logger } from "./logger";
import { operations, resolvePath, type OperationDescriptor, type OperationId } from "./operations";
import type {
  BackupScheduleRequest,
  ClientOptions,
  CredentialsRequest,
  HttpMethod,
  PaymentInitiateRequest,
  PaymentVerifyRequest,
  ValidateLicenseRequest,
  WebhookRegisterRequest,
} from "./types";

const DEFAULT_BASE_URL = "https://api.aegis-os.dev";

interface CallOptions<TBody> {
  params?: Record<string, string | number>;
  body?: TBody;
}

function serializeBody(body: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(body);
  } catch (error) {
    throw new ClientError("serialization", "Failed to serialize request body", { cause: error });
  }
  if (text === undefined) {
    throw new ClientError("serialization", "Request body has no JSON representation");
  }
  return text;
}

function parseErrorPayload(body: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // non-JSON error bodies are kept verbatim on ApiError.body
  }
  return {};
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Client for the Aegis OS licensing and security API.
 *
 * Every method resolves with the raw response body. Non-2xx responses resolve
 * the same way unless `throwOnHttpError` is set, in which case they reject
 * with an {@link ApiError}.
 */
export class AegisClient {
  private readonly options: ClientOptions;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly userId: string;
  private readonly timeoutMs?: number;
  private readonly throwOnHttpError: boolean;
  private readonly transport: typeof fetch;
  private readonly logger: Logger;

  constructor(options: ClientOptions = {}) {
    this.options = { ...options };
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.apiKey = options.apiKey ?? "";
    this.userId = options.userId ?? "";
    this.timeoutMs = options.timeoutMs;
    this.throwOnHttpError = options.throwOnHttpError ?? false;
    this.transport = options.transport ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? silentLogger;
  }

  static fromEnv(env?: ClientEnvironment, overrides: ClientOptions = {}): AegisClient {
    return new AegisClient({ ...loadClientOptions(env), ...overrides });
  }

  get supportedOperations(): OperationDescriptor[] {
    return Object.values(operations);
  }

  clone(overrides: ClientOptions = {}): AegisClient {
    return new AegisClient({ ...this.options, ...overrides });
  }

  async dispatch<TBody = never>(method: HttpMethod, endpoint: string, body?: TBody): Promise<string> {
    const headers = buildHeaders(this.apiKey, this.userId);
    const payload = method === "POST" && body !== undefined ? serializeBody(body) : undefined;
    const url = `${this.baseUrl}${endpoint}`;

    const controller = this.timeoutMs === undefined ? undefined : new AbortController();
    const timeout = controller ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    this.logger.debug("dispatching request", { method, url });
    let response: Response;
    let text: string;
    try {
      response = await this.transport(url, {
        method,
        headers,
        body: payload,
        signal: controller?.signal,
      });
      text = await response.text();
    } catch (error) {
      const message = controller?.signal.aborted
        ? `Request to ${url} timed out after ${this.timeoutMs}ms`
        : `Request to ${url} failed: ${describeError(error)}`;
      this.logger.warn("request failed", { method, url, error: describeError(error) });
      throw new ClientError("transport", message, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    this.logger.debug("received response", { method, url, status: response.status, bytes: Buffer.byteLength(text) });
    if (this.throwOnHttpError && !response.ok) {
      const error = this.toError(response, text);
      this.logger.warn("request rejected", { method, url, status: response.status, code: error.code });
      throw error;
    }
    return text;
  }

  validateLicense(key: string): Promise<string> {
    return this.call<ValidateLicenseRequest>("validateLicense", { body: { key } });
  }

  getLicenseStatus(): Promise<string> {
    return this.call("getLicenseStatus");
  }

  getTiers(): Promise<string> {
    return this.call("getTiers");
  }

  getTier(tierName: string): Promise<string> {
    return this.call("getTier", { params: { tierName } });
  }

  initiatePayment(tier: string, email: string): Promise<string> {
    return this.call<PaymentInitiateRequest>("initiatePayment", { body: { tier, email } });
  }

  verifyPayment(transactionId: string, tier: string): Promise<string> {
    return this.call<PaymentVerifyRequest>("verifyPayment", {
      body: { transaction_id: transactionId, tier },
    });
  }

  register(email: string, password: string): Promise<string> {
    return this.call<CredentialsRequest>("register", { body: { email, password } });
  }

  login(email: string, password: string): Promise<string> {
    return this.call<CredentialsRequest>("login", { body: { email, password } });
  }

  getProfile(): Promise<string> {
    return this.call("getProfile");
  }

  enableTwoFactor(): Promise<string> {
    return this.call("enableTwoFactor");
  }

  getSecurityCheck(): Promise<string> {
    return this.call("getSecurityCheck");
  }

  registerWebhook(url: string, events: string[]): Promise<string> {
    return this.call<WebhookRegisterRequest>("registerWebhook", { body: { url, events } });
  }

  listWebhooks(): Promise<string> {
    return this.call("listWebhooks");
  }

  deleteWebhook(webhookId: string): Promise<string> {
    return this.call("deleteWebhook", { params: { webhookId } });
  }

  getAnalytics(): Promise<string> {
    return this.call("getAnalytics");
  }

  getAuditLog(limit = 100): Promise<string> {
    return this.call("getAuditLog", { params: { limit } });
  }

  scheduleBackup(schedule: string, retentionDays = 30): Promise<string> {
    return this.call<BackupScheduleRequest>("scheduleBackup", {
      body: { schedule, retention_days: retentionDays },
    });
  }

  listBackups(): Promise<string> {
    return this.call("listBackups");
  }

  listApps(): Promise<string> {
    return this.call("listApps");
  }

  installApp(appId: string): Promise<string> {
    return this.call("installApp", { params: { appId } });
  }

  getSystemStatus(): Promise<string> {
    return this.call("getSystemStatus");
  }

  getSystemHealth(): Promise<string> {
    return this.call("getSystemHealth");
  }

  getRateLimit(): Promise<string> {
    return this.call("getRateLimit");
  }

  private async call<TBody = never>(operationId: OperationId, options: CallOptions<TBody> = {}): Promise<string> {
    const operation: OperationDescriptor = operations[operationId];
    const endpoint = resolvePath(operation.path, options.params);
    return this.dispatch(operation.method, endpoint, options.body);
  }

  private toError(response: Response, body: string): ApiError {
    const parsed = parseErrorPayload(body);
    const code = typeof parsed.code === "string" ? parsed.code : `HTTP_${response.status}`;
    const message =
      typeof parsed.message === "string"
        ? parsed.message
        : typeof parsed.error === "string"
          ? parsed.error
          : response.statusText || `HTTP ${response.status}`;
    const options = { code, httpStatus: response.status, message, body, details: parsed };

    if (response.status === 429) {
      const retryAfterHeader = response.headers.get("Retry-After");
      const retryAfterSeconds = retryAfterHeader === null ? Number.NaN : Number(retryAfterHeader);
      return new RateLimitedError({
        ...options,
        retryAfterMs: Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : undefined,
      });
    }

    if (response.status === 400) {
      return new InvalidBodyError(options);
    }

    return new ApiError(options);
  }
}
