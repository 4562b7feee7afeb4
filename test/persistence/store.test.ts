import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SessionStore } from "../../src/persistence/store.js";
import { sessionSummary } from "../fixtures.js";

describe("SessionStore", () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(":memory:");
  });

  afterEach(() => store.close());

  it("stores and returns a full summary", () => {
    const summary = sessionSummary();
    store.insert(summary);

    expect(store.get("session-1")).toEqual(summary);
  });

  it("returns undefined for an unknown session", () => {
    expect(store.get("missing")).toBeUndefined();
  });

  it("lists sessions newest first as compact records", () => {
    store.insert(sessionSummary({ sessionId: "older", startedAt: "2026-03-01T09:00:00.000Z" }));
    store.insert(
      sessionSummary({
        sessionId: "newer",
        startedAt: "2026-03-02T09:00:00.000Z",
        overallStatus: "success",
        counts: { total: 2, succeeded: 2, failed: 0, timedOut: 0, propagated: 0, cancelled: 0 },
      }),
    );

    expect(store.list()).toEqual([
      {
        sessionId: "newer",
        target: ["Safety"],
        overallStatus: "success",
        startedAt: "2026-03-02T09:00:00.000Z",
        durationSeconds: 2.5,
        succeeded: 2,
        failed: 0,
        timedOut: 0,
      },
      {
        sessionId: "older",
        target: ["Safety"],
        overallStatus: "failure",
        startedAt: "2026-03-01T09:00:00.000Z",
        durationSeconds: 2.5,
        succeeded: 1,
        failed: 1,
        timedOut: 0,
      },
    ]);
    expect(store.list(1).map((r) => r.sessionId)).toEqual(["newer"]);
  });

  it("replaces a session recorded twice", () => {
    store.insert(sessionSummary());
    store.insert(sessionSummary({ overallStatus: "timeout" }));

    expect(store.list()).toHaveLength(1);
    expect(store.get("session-1")?.overallStatus).toBe("timeout");
  });

  it("deletes one session", () => {
    store.insert(sessionSummary());

    expect(store.delete("session-1")).toBe(true);
    expect(store.delete("session-1")).toBe(false);
    expect(store.list()).toEqual([]);
  });

  it("deletes sessions started before a timestamp", () => {
    store.insert(sessionSummary({ sessionId: "a", startedAt: "2026-01-01T00:00:00.000Z" }));
    store.insert(sessionSummary({ sessionId: "b", startedAt: "2026-02-01T00:00:00.000Z" }));
    store.insert(sessionSummary({ sessionId: "c", startedAt: "2026-03-01T00:00:00.000Z" }));

    expect(store.deleteOlderThan("2026-02-15T00:00:00.000Z")).toBe(2);
    expect(store.list().map((r) => r.sessionId)).toEqual(["c"]);
  });
});
