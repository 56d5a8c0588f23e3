import { beforeEach, describe, expect, it } from "vitest";
import { createDb } from "../src/db/index.js";
import { createTestService, type TestService } from "../src/test/authority.js";
import { registerOperator } from "../src/test/http.js";
import { testKeypair } from "../src/test/identity-fixtures.js";
import { parseResetArgs, resetState } from "./reset-state.js";

describe("parseResetArgs", () => {
  it("resets everything without --instance", () => {
    expect(parseResetArgs([])).toEqual({});
  });

  it("normalizes the instance key to lower case", () => {
    expect(parseResetArgs(["--instance", "AB".repeat(32)])).toEqual({ instancePubkey: "ab".repeat(32) });
  });

  it("rejects a malformed instance key", () => {
    expect(() => parseResetArgs(["--instance", "abc"])).toThrow("--instance must be a 32-byte hex public key");
  });

  it("rejects unknown options", () => {
    expect(() => parseResetArgs(["--everything"])).toThrow();
  });
});

describe("resetState", () => {
  let service: TestService;

  beforeEach(async () => {
    service = createTestService();
    await registerOperator(service.app, testKeypair(2), service.instanceKey.publicKey);
    return () => service.sqlite.close();
  });

  it("leaves other instances' state alone", () => {
    const removed = resetState(createDb(service.sqlite), { instancePubkey: "ab".repeat(32) });
    expect(removed).toBe(0);
    expect(service.authority.getRecord().state).toBe("operator_registered");
  });

  it("returns the instance to unregistered", () => {
    const removed = resetState(createDb(service.sqlite), { instancePubkey: service.instanceKey.publicKeyHex });
    expect(removed).toBe(1);
    expect(service.authority.getRecord()).toMatchObject({ state: "unregistered", version: 0 });
    expect(service.authority.listTransitions()).toEqual([]);
  });

  it("allows registering again after a full reset", async () => {
    expect(resetState(createDb(service.sqlite), {})).toBe(1);
    const token = await registerOperator(service.app, testKeypair(5), service.instanceKey.publicKey);
    expect(token).toMatch(/^[0-9a-f]{64}$/);
    expect(service.authority.getRecord()).toMatchObject({ state: "operator_registered", version: 1 });
  });
});
