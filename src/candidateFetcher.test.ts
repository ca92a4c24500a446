import { describe, it, expect, vi } from "vitest";
import { fetchCandidates } from "./candidateFetcher.js";
import { ScanBudget } from "./scanBudget.js";
import { plan } from "./matchPlanner.js";
import type { CandidateStub } from "./types.js";
import { FakeTransport } from "./testing/fakeTransport.js";
import { makeMessage, makeRule } from "./testing/fixtures.js";

// Suppress logger output during tests
vi.mock("./config.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function messages(count: number, prefix = "m") {
  return Array.from({ length: count }, (_, i) => makeMessage({ id: `${prefix}${i + 1}` }));
}

async function collect(iterable: AsyncIterable<CandidateStub>): Promise<string[]> {
  const ids: string[] = [];
  for await (const stub of iterable) {
    ids.push(stub.id);
  }
  return ids;
}

describe("fetchCandidates", () => {
  const rulePlan = plan(makeRule({ id: "r1" }));

  it("should combine the global filter with the rule fragment", async () => {
    const transport = new FakeTransport({ messages: messages(2) });

    await collect(fetchCandidates(transport, rulePlan, "in:inbox", new ScanBudget()));

    expect(transport.listCalls[0].query).toBe("in:inbox from:a@b.com");
  });

  it("should page through all results when unbounded", async () => {
    const transport = new FakeTransport({ messages: messages(5), maxPageSize: 2 });

    const ids = await collect(fetchCandidates(transport, rulePlan, "", new ScanBudget()));

    expect(ids).toEqual(["m1", "m2", "m3", "m4", "m5"]);
    expect(transport.listCalls.map((c) => c.pageToken)).toEqual([undefined, "2", "4"]);
    expect(transport.listCalls.every((c) => c.maxResults === 2)).toBe(true);
  });

  it("should honor a smaller requested page size", async () => {
    const transport = new FakeTransport({ messages: messages(3) });

    await collect(
      fetchCandidates(transport, rulePlan, "", new ScanBudget(), { pageSize: 2 })
    );

    expect(transport.listCalls.map((c) => c.maxResults)).toEqual([2, 2]);
  });

  it("should never request more than the remaining budget", async () => {
    const transport = new FakeTransport({ messages: messages(10), maxPageSize: 4 });
    const budget = new ScanBudget(6);

    const ids = await collect(fetchCandidates(transport, rulePlan, "", budget));

    expect(ids).toHaveLength(6);
    expect(transport.listCalls.map((c) => c.maxResults)).toEqual([4, 2]);
    expect(budget.isExhausted()).toBe(true);
  });

  it("should not call the transport once the budget is spent", async () => {
    const transport = new FakeTransport({ messages: messages(3) });
    const budget = new ScanBudget(1);
    budget.consume(1);

    const ids = await collect(fetchCandidates(transport, rulePlan, "", budget));

    expect(ids).toEqual([]);
    expect(transport.listCalls).toHaveLength(0);
  });

  it("should cap candidates when the server returns more than requested", async () => {
    const transport = new FakeTransport({ messages: messages(4) });
    // server ignores maxResults
    transport.listCandidates = async () => ({
      messages: messages(4).map((m) => ({ id: m.id, threadId: null })),
      nextPageToken: "more",
    });
    const budget = new ScanBudget(3);

    const ids = await collect(fetchCandidates(transport, rulePlan, "", budget));

    expect(ids).toEqual(["m1", "m2", "m3"]);
    expect(budget.scanned).toBe(3);
  });

  it("should propagate transport errors", async () => {
    const transport = new FakeTransport({
      failList: () => new Error("boom"),
    });

    await expect(
      collect(fetchCandidates(transport, rulePlan, "", new ScanBudget()))
    ).rejects.toThrow("boom");
  });
});
