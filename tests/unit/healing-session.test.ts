import { describe, it, expect } from "vitest";
import { bindingPairKey, createHealingSession, recordAttempt } from "../../src/healing/session.js";

const thresholds = { warnAt: 2, stopAt: 3 };

describe("Healing session", () => {
  it("starts empty", () => {
    const session = createHealingSession("session-1");

    expect(session.id).toBe("session-1");
    expect(session.generatedBindings.size).toBe(0);
    expect(session.rejectedBindings.size).toBe(0);
    expect(session.history).toEqual([]);
    expect(session.stagnationCount).toBe(0);
  });

  it("keys binding pairs by direction", () => {
    expect(bindingPairKey("a", "b")).toBe("a->b");
    expect(bindingPairKey("b", "a")).not.toBe(bindingPairKey("a", "b"));
  });

  it("counts empty attempts toward stagnation", () => {
    const session = createHealingSession();

    expect(recordAttempt(session, [], thresholds)).toBe("stagnant");
    expect(recordAttempt(session, [], thresholds)).toBe("warn");
    expect(recordAttempt(session, [], thresholds)).toBe("stop");
    expect(session.history).toEqual([[], [], []]);
  });

  it("treats a repeat of the previous attempt as stagnant", () => {
    const session = createHealingSession();

    expect(recordAttempt(session, ["op a"], thresholds)).toBe("progress");
    expect(recordAttempt(session, ["op a"], thresholds)).toBe("stagnant");
    expect(session.stagnationCount).toBe(1);
  });

  it("resets the counter on progress", () => {
    const session = createHealingSession();

    recordAttempt(session, [], thresholds);
    recordAttempt(session, [], thresholds);
    expect(recordAttempt(session, ["op b"], thresholds)).toBe("progress");
    expect(session.stagnationCount).toBe(0);
  });

  it("records a copy of the operations", () => {
    const session = createHealingSession();
    const ops = ["op c"];

    recordAttempt(session, ops, thresholds);
    ops.push("later");

    expect(session.history).toEqual([["op c"]]);
  });
});
