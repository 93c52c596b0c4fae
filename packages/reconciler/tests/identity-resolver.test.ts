/**
 * Tests for IdentityResolver.
 */
import { describe, it, expect } from "vitest";
import type { ParticipantContacts, ParticipantDirectory } from "@closeout/types";
import { IdentityResolver } from "../src/identity-resolver.js";

const BANK_A: ParticipantContacts = {
  participantName: "bank-a",
  displayName: "Bank A",
  contacts: ["ops@bank-a.test"],
};

function directory(entries: Record<string, ParticipantContacts>): ParticipantDirectory {
  return {
    getContacts: (accountId) => Promise.resolve(entries[accountId]),
  };
}

describe("IdentityResolver", () => {
  it("resolves a known account", async () => {
    const resolver = new IdentityResolver({ directory: directory({ "11": BANK_A }) });
    const result = await resolver.resolve("11");
    expect(result).toEqual({
      ok: true,
      value: { accountId: "11", ...BANK_A },
    });
  });

  it("reports IDENTITY_UNRESOLVED for an unknown account", async () => {
    const resolver = new IdentityResolver({ directory: directory({}) });
    const result = await resolver.resolve("404");
    expect(result).toEqual({
      ok: false,
      error: {
        code: "IDENTITY_UNRESOLVED",
        accountId: "404",
        message: "No participant found for account '404'",
      },
    });
  });

  it("reports IDENTITY_UNRESOLVED when the directory fails", async () => {
    const resolver = new IdentityResolver({
      directory: { getContacts: () => Promise.reject(new Error("directory down")) },
    });
    const result = await resolver.resolve("11");
    expect(!result.ok && result.error.message).toBe("directory down");
  });

  it("gives up on a directory that does not answer in time", async () => {
    const resolver = new IdentityResolver({
      directory: { getContacts: () => new Promise(() => undefined) },
      timeoutMs: 5,
    });
    const result = await resolver.resolve("11");
    expect(!result.ok && result.error.message).toBe(
      "Directory lookup for account '11' timed out after 5ms",
    );
  });

  it("resolves many accounts, once each", async () => {
    let calls = 0;
    const resolver = new IdentityResolver({
      directory: {
        getContacts: (accountId) => {
          calls++;
          return Promise.resolve(accountId === "11" ? BANK_A : undefined);
        },
      },
    });
    const results = await resolver.resolveMany(["11", "12", "11"]);

    expect(calls).toBe(2);
    expect([...results.keys()]).toEqual(["11", "12"]);
    expect(results.get("11")?.ok).toBe(true);
    expect(results.get("12")?.ok).toBe(false);
  });
});
