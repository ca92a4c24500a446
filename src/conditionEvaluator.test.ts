import { describe, it, expect } from "vitest";
import { evaluate, evaluateRule, assertSupported } from "./conditionEvaluator.js";
import { UnsupportedConditionError } from "./errors.js";
import { condition, makeMessage, makeRule } from "./testing/fixtures.js";

describe("evaluate", () => {
  const message = makeMessage({
    id: "m1",
    from: "Alice <Alice@Example.com>",
    to: "me@example.com",
    subject: "Weekly Newsletter",
    bodySnippet: "Your digest is ready",
    labels: ["INBOX", "Promo"],
    receivedAt: new Date("2024-05-10T12:00:00Z"),
  });

  describe("text fields", () => {
    it("should match contains case-insensitively", () => {
      expect(evaluate(condition("from", "contains", "alice@example.com"), message)).toBe(true);
      expect(evaluate(condition("subject", "contains", "NEWSLETTER"), message)).toBe(true);
      expect(evaluate(condition("body_snippet", "contains", "invoice"), message)).toBe(false);
    });

    it("should negate with not_contains", () => {
      expect(evaluate(condition("subject", "not_contains", "invoice"), message)).toBe(true);
      expect(evaluate(condition("subject", "not_contains", "weekly"), message)).toBe(false);
    });

    it("should compare whole values with equals and not_equals", () => {
      expect(evaluate(condition("to", "equals", "ME@example.com"), message)).toBe(true);
      expect(evaluate(condition("to", "equals", "me@example"), message)).toBe(false);
      expect(evaluate(condition("to", "not_equals", "me@example"), message)).toBe(true);
    });

    it("should support starts_with and ends_with", () => {
      expect(evaluate(condition("subject", "starts_with", "weekly"), message)).toBe(true);
      expect(evaluate(condition("subject", "ends_with", "letter"), message)).toBe(true);
      expect(evaluate(condition("subject", "ends_with", "weekly"), message)).toBe(false);
    });
  });

  describe("label field", () => {
    it("should test set membership case-insensitively", () => {
      expect(evaluate(condition("label", "contains", "promo"), message)).toBe(true);
      expect(evaluate(condition("label", "equals", "Promo"), message)).toBe(true);
      expect(evaluate(condition("label", "contains", "Prom"), message)).toBe(false);
    });

    it("should negate membership", () => {
      expect(evaluate(condition("label", "not_contains", "Work"), message)).toBe(true);
      expect(evaluate(condition("label", "not_equals", "inbox"), message)).toBe(false);
    });
  });

  describe("date field", () => {
    it("should compare received date with before and after", () => {
      expect(evaluate(condition("date", "before", "2024/06/01"), message)).toBe(true);
      expect(evaluate(condition("date", "after", "2024-06-01"), message)).toBe(false);
      expect(evaluate(condition("date", "after", "2024/05/10"), message)).toBe(true);
    });

    it("should treat equals as the same UTC day", () => {
      expect(evaluate(condition("date", "equals", "2024/05/10"), message)).toBe(true);
      expect(evaluate(condition("date", "not_equals", "2024/05/11"), message)).toBe(true);
    });

    it("should not match a message without a received date", () => {
      const undated = makeMessage({ id: "m2" });
      expect(evaluate(condition("date", "before", "2030/01/01"), undated)).toBe(false);
    });
  });

  describe("unsupported combinations", () => {
    it("should throw for a date operator on a text field", () => {
      expect(() => evaluate(condition("subject", "before", "2024/01/01"), message)).toThrow(
        UnsupportedConditionError
      );
    });

    it("should throw for prefix matching on labels", () => {
      expect(() => assertSupported(condition("label", "starts_with", "Pro"))).toThrow(
        "Operator 'starts_with' is not supported for field 'label'"
      );
    });

    it("should throw for contains on dates", () => {
      expect(() => evaluate(condition("date", "contains", "2024"), message)).toThrow(
        UnsupportedConditionError
      );
    });
  });
});

describe("evaluateRule", () => {
  const message = makeMessage({
    id: "m1",
    from: "news@shop.com",
    subject: "Big sale",
  });

  it("should require every condition under AND", () => {
    const rule = makeRule({
      id: "r1",
      conditions: [
        condition("from", "contains", "shop.com"),
        condition("subject", "contains", "sale"),
      ],
    });
    expect(evaluateRule(rule, message)).toBe(true);

    const failing = makeRule({
      id: "r2",
      conditions: [
        condition("from", "contains", "shop.com"),
        condition("subject", "contains", "invoice"),
      ],
    });
    expect(evaluateRule(failing, message)).toBe(false);
  });

  it("should require one condition under OR", () => {
    const rule = makeRule({
      id: "r1",
      condition_conjunction: "OR",
      conditions: [
        condition("from", "contains", "a@b.com"),
        condition("subject", "contains", "sale"),
      ],
    });
    expect(evaluateRule(rule, message)).toBe(true);
  });

  it("should never match a rule without conditions", () => {
    expect(evaluateRule(makeRule({ id: "r1", conditions: [] }), message)).toBe(false);
    expect(
      evaluateRule(makeRule({ id: "r2", condition_conjunction: "OR", conditions: [] }), message)
    ).toBe(false);
  });

  it("should short-circuit AND before reaching an unsupported condition", () => {
    const rule = makeRule({
      id: "r1",
      conditions: [
        condition("from", "contains", "nobody"),
        condition("label", "ends_with", "x"),
      ],
    });
    expect(evaluateRule(rule, message)).toBe(false);
  });
});
