import { describe, it, expect, vi } from "vitest";
import { RuleEngine } from "./ruleEngine.js";
import {
  RuleValidationError,
  TransportAuthError,
  TransportError,
} from "./errors.js";
import { FakeTransport } from "./testing/fakeTransport.js";
import {
  addLabel,
  condition,
  makeMessage,
  makeRule,
  removeLabel,
} from "./testing/fixtures.js";

// Suppress logger output during tests
vi.mock("./config.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function inbox(count: number) {
  return Array.from({ length: count }, (_, i) =>
    makeMessage({ id: `m${i + 1}`, from: "a@b.com" })
  );
}

const orRule = makeRule({
  id: "r-or",
  condition_conjunction: "OR",
  conditions: [
    condition("from", "contains", "a@b.com"),
    condition("body_snippet", "contains", "invoice"),
  ],
  actions: [{ type: "trash" }],
});

const mixedInbox = [
  makeMessage({ id: "m1", from: "a@b.com" }),
  makeMessage({ id: "m2", from: "shop@x.com", bodySnippet: "Your invoice is attached" }),
  makeMessage({ id: "m3", from: "friend@y.com", bodySnippet: "Lunch?" }),
];

describe("RuleEngine", () => {
  describe("run", () => {
    it("should apply a translatable rule without fetching details", async () => {
      const transport = new FakeTransport({ messages: inbox(2) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [makeRule({ id: "r1", actions: [addLabel("L")] })],
        dryRun: false,
      });

      expect(transport.listCalls.map((c) => c.query)).toEqual(["from:a@b.com"]);
      expect(transport.detailCalls).toEqual([]);
      expect(transport.mutations).toEqual([
        { method: "batchModifyLabels", ids: ["m1", "m2"], add: ["L"], remove: [] },
      ]);
      expect(summary).toEqual({
        dryRun: false,
        state: "EXECUTED",
        scanned: 2,
        scanLimitReached: false,
        matchedPerRule: { r1: 2 },
        messagesMatched: 2,
        actionsPerType: { "add_label:L": 2 },
        errors: [],
        skippedRules: [],
      });
      expect(engine.state).toBe("EXECUTED");
    });

    it("should evaluate partially translatable rules on fetched details", async () => {
      const transport = new FakeTransport({ messages: mixedInbox });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({ rules: [orRule], dryRun: false });

      expect(transport.listCalls.map((c) => c.query)).toEqual([""]);
      expect(transport.detailCalls).toEqual(["m1", "m2", "m3"]);
      expect(transport.mutations).toEqual([{ method: "batchTrash", ids: ["m1", "m2"] }]);
      expect(summary.matchedPerRule).toEqual({ "r-or": 2 });
    });

    it("should trash a message that matches only the subject of an OR rule", async () => {
      const transport = new FakeTransport({
        messages: [
          makeMessage({ id: "m1", from: "a@b.com", subject: "Hello" }),
          makeMessage({ id: "m2", from: "c@d.com", subject: "X marks the spot" }),
          makeMessage({ id: "m3", from: "c@d.com", subject: "Lunch" }),
        ],
      });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({
            id: "r-or",
            condition_conjunction: "OR",
            conditions: [
              condition("from", "contains", "a@b.com"),
              condition("subject", "contains", "X"),
            ],
            actions: [{ type: "trash" }],
          }),
        ],
        dryRun: false,
      });

      expect(transport.listCalls.map((c) => c.query)).toEqual(["(from:a@b.com OR subject:X)"]);
      expect(transport.detailCalls).toEqual(["m1", "m2", "m3"]);
      expect(transport.mutations).toEqual([{ method: "batchTrash", ids: ["m1", "m2"] }]);
      expect(summary.matchedPerRule).toEqual({ "r-or": 2 });
    });

    it("should skip rules without conditions or actions", async () => {
      const transport = new FakeTransport({ messages: inbox(2) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({ id: "no-conditions", conditions: [], actions: [{ type: "delete" }] }),
          makeRule({ id: "no-actions", actions: [] }),
        ],
        dryRun: false,
      });

      expect(transport.listCalls).toHaveLength(0);
      expect(transport.mutations).toEqual([]);
      expect(summary.matchedPerRule).toEqual({});
      expect(summary.skippedRules).toEqual([
        {
          ruleId: "no-conditions",
          ruleName: "no-conditions",
          errorKind: "RuleValidationError",
          message:
            "Invalid rule 'no-conditions': conditions: at least one condition is required",
        },
        {
          ruleId: "no-actions",
          ruleName: "no-actions",
          errorKind: "RuleValidationError",
          message: "Invalid rule 'no-actions': actions: at least one action is required",
        },
      ]);
    });

    it("should resolve add and remove of the same label across rules", async () => {
      const transport = new FakeTransport({ messages: inbox(1) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({ id: "r1", actions: [addLabel("Promo")] }),
          makeRule({ id: "r2", actions: [removeLabel("Promo")] }),
        ],
        dryRun: false,
      });

      expect(transport.mutations).toEqual([
        { method: "batchModifyLabels", ids: ["m1"], add: [], remove: ["Promo"] },
      ]);
      expect(summary.matchedPerRule).toEqual({ r1: 1, r2: 1 });
      expect(summary.messagesMatched).toBe(1);
      expect(summary.actionsPerType).toEqual({ "remove_label:Promo": 1 });
    });

    it("should share the scan limit across rules", async () => {
      const transport = new FakeTransport({ messages: inbox(10) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({ id: "r1" }),
          makeRule({ id: "r2" }),
          makeRule({ id: "r3" }),
        ],
        scanLimit: 5,
        dryRun: false,
      });

      expect(transport.listCalls).toEqual([
        { query: "from:a@b.com", maxResults: 5, pageToken: undefined },
      ]);
      expect(summary.scanned).toBe(5);
      expect(summary.scanLimitReached).toBe(true);
      expect(summary.matchedPerRule).toEqual({ r1: 5, r2: 0, r3: 0 });
      expect(transport.mutations).toEqual([
        { method: "batchTrash", ids: ["m1", "m2", "m3", "m4", "m5"] },
      ]);
    });

    it("should not report the scan limit as reached when candidates run out first", async () => {
      const transport = new FakeTransport({ messages: inbox(3) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [makeRule({ id: "r1" })],
        scanLimit: 5,
        dryRun: false,
      });

      expect(summary.scanned).toBe(3);
      expect(summary.scanLimitReached).toBe(false);
    });

    it("should ignore disabled rules entirely", async () => {
      const transport = new FakeTransport({ messages: inbox(2) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [makeRule({ id: "off", is_enabled: false })],
        dryRun: false,
      });

      expect(transport.listCalls).toHaveLength(0);
      expect(summary.matchedPerRule).toEqual({});
      expect(summary.scanned).toBe(0);
      expect(summary.state).toBe("EXECUTED");
    });

    it("should restrict the run to the requested rules", async () => {
      const transport = new FakeTransport({ messages: inbox(1) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({ id: "r1", name: "First" }),
          makeRule({ id: "r2", name: "Second", actions: [{ type: "mark_read" }] }),
        ],
        ruleIds: ["second"],
        dryRun: false,
      });

      expect(summary.matchedPerRule).toEqual({ r2: 1 });
      expect(transport.mutations).toEqual([{ method: "batchMark", ids: ["m1"], markAs: "read" }]);
    });

    it("should combine the query and date range into every list call", async () => {
      const transport = new FakeTransport({ messages: inbox(1) });
      const engine = new RuleEngine(transport);

      await engine.run({
        rules: [makeRule({ id: "r1" })],
        query: "in:inbox",
        dateRange: { after: "2024/01/01" },
        dryRun: true,
      });

      expect(transport.listCalls[0].query).toBe("in:inbox after:2024/01/01 from:a@b.com");
    });

    it("should report invalid, duplicate and unsupported rules and run the rest", async () => {
      const transport = new FakeTransport({ messages: inbox(1) });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({ id: "r1" }),
          makeRule({ id: "r1", name: "copy" }),
          makeRule({ id: "r2", conditions: [condition("label", "starts_with", "Pro")] }),
        ],
        invalidRules: [
          new RuleValidationError("Invalid rule 'Broken': name is required", [], {
            id: "bad",
            name: "Broken",
          }),
        ],
        dryRun: false,
      });

      expect(summary.skippedRules).toEqual([
        {
          ruleId: "bad",
          ruleName: "Broken",
          errorKind: "RuleValidationError",
          message: "Invalid rule 'Broken': name is required",
        },
        {
          ruleId: "r1",
          ruleName: "copy",
          errorKind: "RuleValidationError",
          message: "Duplicate rule id 'r1'",
        },
        {
          ruleId: "r2",
          ruleName: "r2",
          errorKind: "UnsupportedConditionError",
          message: "Operator 'starts_with' is not supported for field 'label'",
        },
      ]);
      expect(summary.matchedPerRule).toEqual({ r1: 1 });
      expect(transport.listCalls).toHaveLength(1);
    });

    it("should record a failed detail fetch and keep matching", async () => {
      const transport = new FakeTransport({
        messages: mixedInbox,
        failDetails: (id) =>
          id === "m2" ? new TransportError("messages.get failed (500): backend error", 500) : null,
      });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({ rules: [orRule], dryRun: false });

      expect(summary.matchedPerRule).toEqual({ "r-or": 1 });
      expect(summary.errors).toEqual([
        {
          stage: "fetch",
          action: null,
          messageIds: ["m2"],
          errorKind: "TransportError",
          message: "messages.get failed (500): backend error",
        },
      ]);
      expect(transport.mutations).toEqual([{ method: "batchTrash", ids: ["m1"] }]);
    });

    it("should record a failed listing and continue with the next rule", async () => {
      const transport = new FakeTransport({
        messages: inbox(1),
        failList: (query) => (query === "from:a@b.com" ? new Error("boom") : null),
      });
      const engine = new RuleEngine(transport);

      const summary = await engine.run({
        rules: [
          makeRule({ id: "r1" }),
          makeRule({
            id: "r2",
            conditions: [condition("subject", "contains", "hello")],
            actions: [{ type: "mark_unread" }],
          }),
        ],
        dryRun: false,
      });

      expect(summary.matchedPerRule).toEqual({ r1: 0, r2: 1 });
      expect(summary.errors).toEqual([
        { stage: "fetch", action: null, messageIds: [], errorKind: "Error", message: "boom" },
      ]);
      expect(summary.state).toBe("EXECUTED");
    });

    it("should fetch each message's details at most once per run", async () => {
      const transport = new FakeTransport({ messages: mixedInbox });
      const engine = new RuleEngine(transport);
      const labelRule = makeRule({
        id: "r-label",
        conditions: [condition("body_snippet", "contains", "lunch")],
        actions: [addLabel("Social")],
      });

      const summary = await engine.run({ rules: [orRule, labelRule], dryRun: false });

      expect(transport.detailCalls).toEqual(["m1", "m2", "m3"]);
      expect(summary.matchedPerRule).toEqual({ "r-or": 2, "r-label": 1 });
      expect(summary.messagesMatched).toBe(3);
    });

    it("should abort the run on authentication failure", async () => {
      const transport = new FakeTransport({
        messages: inbox(1),
        failList: () => new TransportAuthError("token revoked", 401),
      });
      const engine = new RuleEngine(transport);

      await expect(
        engine.run({ rules: [makeRule({ id: "r1" })], dryRun: false })
      ).rejects.toBeInstanceOf(TransportAuthError);
      expect(engine.state).toBe("ABORTED");
      expect(transport.mutations).toHaveLength(0);
    });

    it("should abort when a mutation is rejected for authentication", async () => {
      const transport = new FakeTransport({
        messages: inbox(1),
        failMutation: () => new TransportAuthError("token revoked", 401),
      });
      const engine = new RuleEngine(transport);

      await expect(
        engine.run({ rules: [makeRule({ id: "r1" })], dryRun: false })
      ).rejects.toThrow("token revoked");
      expect(engine.state).toBe("ABORTED");
    });
  });

  describe("preview", () => {
    it("should report the same summary as a live run without mutating", async () => {
      const rules = [
        orRule,
        makeRule({ id: "r1", actions: [addLabel("Promo"), { type: "mark_read" }] }),
        makeRule({ id: "r2", actions: [removeLabel("Promo")] }),
      ];
      const dryTransport = new FakeTransport({ messages: mixedInbox });
      const liveTransport = new FakeTransport({ messages: mixedInbox });

      const dry = await new RuleEngine(dryTransport).preview({ rules });
      const live = await new RuleEngine(liveTransport).run({ rules, dryRun: false });

      expect(dryTransport.mutations).toHaveLength(0);
      expect(liveTransport.mutations.length).toBeGreaterThan(0);
      expect(dry.dryRun).toBe(true);
      expect(dry.state).toBe("DRY_REPORTED");
      expect({ ...dry, dryRun: false, state: "EXECUTED" }).toEqual(live);
    });
  });
});
