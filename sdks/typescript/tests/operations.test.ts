import { describe, expect, it } from "vitest";
import { ClientError } from "../src/errors";
import { operations, resolvePath } from "../src/operations";

describe("resolvePath", () => {
  it("percent-encodes parameters", () => {
    expect(resolvePath(operations.getTier.path, { tierName: "pro/plus" })).toBe("/api/v1/tier/pro%2Fplus");
  });

  it("leaves paths without placeholders untouched", () => {
    expect(resolvePath(operations.getTiers.path)).toBe("/api/v1/tiers");
  });

  it("rejects a missing parameter with a ClientError", () => {
    let caught: unknown;
    try {
      resolvePath(operations.deleteWebhook.path, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ClientError);
    expect(caught).toMatchObject({
      stage: "serialization",
      message: 'Missing path parameter "webhookId" for /api/v1/webhooks/{webhookId}',
    });
  });
});
