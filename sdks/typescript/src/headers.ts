import { ClientError } from "./errors";

// RFC 9110 field-value: visible ASCII and obs-text, with SP/HTAB allowed only between them.
// fetch trims surrounding whitespace, so a value starting or ending with SP/HTAB would not go out as configured.
const FIELD_VALUE = /^(?:[\x21-\x7e\x80-\xff](?:[\t\x20-\x7e\x80-\xff]*[\x21-\x7e\x80-\xff])?)?$/;

export type RequestHeaders = {
  "Content-Type": "application/json";
  "X-API-Key": string;
  "X-User-ID": string;
};

function assertFieldValue(name: string, value: string): void {
  if (!FIELD_VALUE.test(value)) {
    throw new ClientError("headers", `Invalid character in ${name} header value`);
  }
}

export function buildHeaders(apiKey: string, userId: string): RequestHeaders {
  assertFieldValue("X-API-Key", apiKey);
  assertFieldValue("X-User-ID", userId);
  return {
    "Content-Type": "application/json",
    "X-API-Key": apiKey,
    "X-User-ID": userId,
  };
}
