import assert from "assert";
import { describe, it } from "node:test";
import { errorReply, parseInboundRequest, successReply } from "../utils/apiSchema";
import { normalizeTimestamp } from "../utils/time";

const NEW_YEAR = "2026-01-01T00:00:00.000Z";

describe("parseInboundRequest", () => {
  it("maps senders and normalizes timestamps", () => {
    const parsed = parseInboundRequest({
      sessionId: "abc",
      message: { sender: "scammer", text: "Pay now", timestamp: 1767225600000 },
      conversationHistory: [{ sender: "user", text: "Who is this?", timestamp: "2026-01-01T05:30:00+05:30" }],
      metadata: { channel: "SMS" }
    });
    assert.deepStrictEqual(parsed, {
      ok: true,
      request: {
        sessionId: "abc",
        message: { sender: "counterpart", text: "Pay now", timestamp: NEW_YEAR },
        conversationHistory: [{ sender: "agent", text: "Who is this?", timestamp: NEW_YEAR }],
        metadata: { channel: "SMS" }
      }
    });
  });

  it("defaults the sender and the history", () => {
    const parsed = parseInboundRequest({ sessionId: "abc", message: { text: "hello", timestamp: "1767225600000" } });
    assert.ok(parsed.ok);
    if (!parsed.ok) return;
    assert.strictEqual(parsed.request.message.sender, "counterpart");
    assert.strictEqual(parsed.request.message.timestamp, NEW_YEAR);
    assert.deepStrictEqual(parsed.request.conversationHistory, []);
  });

  it("rejects an empty message text", () => {
    assert.deepStrictEqual(parseInboundRequest({ sessionId: "abc", message: { text: "   " } }), {
      ok: false,
      error: "message.text: text must not be empty"
    });
  });

  it("rejects a missing session id and unknown senders", () => {
    const missing = parseInboundRequest({ message: { text: "hi" } });
    assert.ok(!missing.ok && missing.error.startsWith("sessionId:"));
    const unknown = parseInboundRequest({ sessionId: "abc", message: { sender: "bot", text: "hi" } });
    assert.deepStrictEqual(unknown, {
      ok: false,
      error: "message.sender: sender must be one of scammer, counterpart, user, agent"
    });
  });
});

describe("normalizeTimestamp", () => {
  it("keeps sub-millisecond digits of ISO input", () => {
    assert.strictEqual(normalizeTimestamp("2026-01-01T10:00:00.123456Z"), "2026-01-01T10:00:00.123456Z");
    assert.strictEqual(normalizeTimestamp("2026-01-01T15:30:00.123456+05:30"), "2026-01-01T10:00:00.123456Z");
    assert.strictEqual(normalizeTimestamp("2026-01-01T10:00:00.5Z"), "2026-01-01T10:00:00.500Z");
  });

  it("falls back to the clock for unreadable values", () => {
    const epoch = () => new Date(0);
    assert.strictEqual(normalizeTimestamp("yesterday", epoch), "1970-01-01T00:00:00.000Z");
    assert.strictEqual(normalizeTimestamp(undefined, epoch), "1970-01-01T00:00:00.000Z");
  });
});

describe("reply envelopes", () => {
  it("has the success and error shapes", () => {
    assert.deepStrictEqual(successReply("hi"), { status: "success", reply: "hi" });
    assert.deepStrictEqual(errorReply("bad"), { status: "error", reply: null, error: "bad" });
  });
});
