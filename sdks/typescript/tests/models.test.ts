import { describe, expect, it } from "vitest";
import { ClientError } from "../src/errors";
import {
  LicenseSchema,
  decode,
  decodeBackup,
  decodeLicense,
  decodeSystemStatus,
  decodeUser,
  decodeWebhook,
} from "../src/models";

describe("decoders", () => {
  it("decodes a license", () => {
    const license = decodeLicense('{"tier":"pro","price":29,"features":["a","b"],"expires":"2025-01-01"}');
    expect(license).toEqual({ tier: "pro", price: 29, features: ["a", "b"], expires: "2025-01-01" });
  });

  it("decodes a system status", () => {
    const status = decodeSystemStatus(
      '{"status":"operational","uptime_hours":720,"version":"2.0.0","editions":["basic","gamer"]}',
    );
    expect(status.uptime_hours).toBe(720);
    expect(status.editions).toEqual(["basic", "gamer"]);
  });

  it("decodes a user", () => {
    const user = decodeUser(
      '{"user_id":"u-1","email":"dev@example.com","role":"admin","created":"2024-05-01","two_fa_enabled":true}',
    );
    expect(user.two_fa_enabled).toBe(true);
  });

  it("decodes a webhook with its optional failure count", () => {
    const webhook = decodeWebhook(
      '{"webhook_id":"wh-1","url":"https://hooks.local/a","events":["license.validated"],"created":"2024-05-01","active":true,"failures":2}',
    );
    expect(webhook.failures).toBe(2);
  });

  it("decodes a backup that has not run yet", () => {
    const backup = decodeBackup(
      '{"backup_id":"b-1","schedule":"daily","retention_days":30,"last_backup":null,"next_backup":"2024-05-02","created":"2024-05-01"}',
    );
    expect(backup.last_backup).toBeNull();
  });

  it("drops fields outside the record", () => {
    const license = decode(LicenseSchema, '{"tier":"basic","price":0,"features":[],"expires":"never","extra":1}');
    expect(license).toEqual({ tier: "basic", price: 0, features: [], expires: "never" });
  });

  it("rejects bodies that are not JSON", () => {
    expect(() => decodeLicense("<html>")).toThrowError(
      new ClientError("deserialization", "Response body is not valid JSON"),
    );
  });

  it("names the offending field", () => {
    const error = (() => {
      try {
        decodeLicense('{"tier":"pro","price":-1,"features":[],"expires":"2025-01-01"}');
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ClientError);
    expect(error).toMatchObject({
      stage: "deserialization",
      message: "Response body does not match the expected shape: price: Number must be greater than or equal to 0",
    });
  });

  it("reports root-level mismatches", () => {
    expect(() => decodeSystemStatus("[]")).toThrowError(
      "Response body does not match the expected shape: (root): Expected object, received array",
    );
  });
});
