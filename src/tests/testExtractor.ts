import assert from "assert";
import { describe, it } from "node:test";
import {
  emptyIntelligence,
  extractIntelligence,
  hasIntelligence,
  mergeIntelligence,
  normalizePhone,
  toLists
} from "../core/extractor";

describe("extractIntelligence", () => {
  it("pulls a UPI handle and a phone number out of one message", () => {
    const lists = toLists(extractIntelligence("Pay to refund.desk@ybl or call +91 98765-43210"));
    assert.deepStrictEqual(lists, {
      bankAccounts: [],
      upiIds: ["refund.desk@ybl"],
      phishingLinks: [],
      phoneNumbers: ["+919876543210"],
      suspiciousKeywords: []
    });
  });

  it("canonicalizes every Indian mobile format to the same number", () => {
    for (const text of ["+91 98765-43210", "919876543210", "09876543210", "9876543210"]) {
      assert.deepStrictEqual(Array.from(extractIntelligence(text).phoneNumbers), ["+919876543210"], text);
    }
    assert.strictEqual(extractIntelligence("code 12345").phoneNumbers.size, 0);
  });

  it("strips separators from bank accounts and trailing punctuation from links", () => {
    const intel = extractIntelligence("Transfer to 1234 5678 9012 3456 then open https://kyc-update.example/login?id=7.");
    assert.deepStrictEqual(Array.from(intel.bankAccounts), ["1234567890123456"]);
    assert.deepStrictEqual(Array.from(intel.phishingLinks), ["https://kyc-update.example/login?id=7"]);
  });

  it("lowercases UPI handles so case variants collapse", () => {
    const intel = extractIntelligence("Send to Scammer@PAYTM or scammer@paytm");
    assert.deepStrictEqual(Array.from(intel.upiIds), ["scammer@paytm"]);
    assert.deepStrictEqual(Array.from(intel.suspiciousKeywords), ["send"]);
  });

  it("scans recent history as well as the current message", () => {
    const intel = extractIntelligence("ok", [{ text: "my upi is a.b@oksbi" }]);
    assert.deepStrictEqual(Array.from(intel.upiIds), ["a.b@oksbi"]);
    assert.deepStrictEqual(Array.from(intel.suspiciousKeywords), ["upi"]);
  });

  it("returns the same sets for the same input", () => {
    const text = "Your account is blocked, verify at https://x.example now";
    assert.deepStrictEqual(toLists(extractIntelligence(text)), toLists(extractIntelligence(text)));
  });
});

describe("normalizePhone", () => {
  it("rejects numbers that do not start with 6-9", () => {
    assert.strictEqual(normalizePhone("5876543210"), null);
    assert.strictEqual(normalizePhone("(987) 654-3210"), "+919876543210");
  });
});

describe("mergeIntelligence", () => {
  it("is a set union that leaves both inputs untouched", () => {
    const a = extractIntelligence("pay a@ybl");
    const b = extractIntelligence("pay a@ybl or b@ybl");
    const merged = mergeIntelligence(a, b);

    assert.deepStrictEqual(Array.from(merged.upiIds), ["a@ybl", "b@ybl"]);
    assert.deepStrictEqual(Array.from(a.upiIds), ["a@ybl"]);
    assert.deepStrictEqual(toLists(mergeIntelligence(merged, b)), toLists(merged));
  });

  it("counts suspicious keywords as intelligence", () => {
    assert.strictEqual(hasIntelligence(emptyIntelligence()), false);
    assert.strictEqual(hasIntelligence(extractIntelligence("please verify")), true);
  });
});
