import assert from "assert";
import { describe, it } from "node:test";
import type { Goal } from "../core/planner";
import { validateReply } from "../core/validator";
import { cleanReply, createReplyWriter, fallbackReplyForGoal } from "../core/writer";
import { counterpart, fakeLlm } from "./helpers";

const GOALS: Goal[] = ["CLARIFY", "DELAY", "ESCALATE", "CONTINUE", "WRAP_UP"];

describe("fallbackReplyForGoal", () => {
  it("picks a template from what was asked", () => {
    assert.strictEqual(
      fallbackReplyForGoal("CLARIFY", "Send your UPI"),
      "I'm not comfortable sharing my UPI ID. Is there another way to verify?"
    );
    assert.strictEqual(
      fallbackReplyForGoal("ESCALATE", "Your account is suspended"),
      "This is really worrying. What exactly do I need to do to prevent this? I want to fix this immediately."
    );
    assert.strictEqual(fallbackReplyForGoal("WRAP_UP", "anything"), "I'll check with my bank directly. Thanks for letting me know.");
  });

  it("only produces replies that pass the response gate", () => {
    const prompts = ["upi", "click link", "verify", "urgent", "blocked", "hello"];
    for (const goal of GOALS) {
      for (const text of prompts) {
        assert.deepStrictEqual(validateReply(fallbackReplyForGoal(goal, text)), { ok: true }, `${goal}/${text}`);
      }
    }
  });
});

describe("createReplyWriter", () => {
  const request = { sessionId: "s1", goal: "DELAY" as const, message: counterpart("Pay immediately"), history: [] };
  const template = "I'm at work right now. Can you explain what I need to do? I need a few minutes to understand this.";

  it("uses templates without a model", async () => {
    assert.strictEqual(await createReplyWriter(null, 100)(request), template);
  });

  it("cleans model output", async () => {
    const writer = createReplyWriter(fakeLlm(() => 'Reply: "Which bank is this?"'), 100);
    assert.strictEqual(await writer(request), "Which bank is this?");
  });

  it("falls back on empty output or errors", async () => {
    assert.strictEqual(await createReplyWriter(fakeLlm(() => "   "), 100)(request), template);
    const failing = fakeLlm(() => {
      throw new Error("quota");
    });
    assert.strictEqual(await createReplyWriter(failing, 100)(request), template);
  });
});

describe("cleanReply", () => {
  it("collapses whitespace and strips quotes", () => {
    assert.strictEqual(cleanReply('  "Okay,\n  which   branch?"  '), "Okay, which branch?");
  });
});
