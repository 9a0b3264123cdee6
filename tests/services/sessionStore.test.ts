import { describe, expect, it, vi } from "vitest";
import { InMemorySessionStore } from "../../src/services/sessionStore";
import type { PitchState } from "../../src/types";

const initial: PitchState = {
  description: "Pantry tracker",
  pitchType: "elevator",
  phase: "START",
  autoRefineCount: 0,
  totalIterationCount: 0
};

describe("InMemorySessionStore", () => {
  it("returns copies so callers cannot edit stored state in place", () => {
    const store = new InMemorySessionStore();
    const session = store.create(initial);

    const loaded = store.get(session.id);
    if (!loaded) throw new Error("session missing");
    loaded.state.phase = "DONE";

    expect(store.get(session.id)?.state.phase).toBe("START");
  });

  it("returns the latest value after put", () => {
    const store = new InMemorySessionStore();
    const session = store.create(initial);
    store.put({ ...session, state: { ...session.state, phase: "CONTEXT_DONE", context: "ctx" } });

    expect(store.get(session.id)?.state).toEqual({ ...initial, phase: "CONTEXT_DONE", context: "ctx" });
  });

  it("lists newest sessions first", () => {
    let nowMs = Date.parse("2026-03-01T10:00:00.000Z");
    const store = new InMemorySessionStore(() => new Date(nowMs));
    const older = store.create(initial);
    nowMs += 1000;
    const newer = store.create(initial);

    expect(store.list().map((session) => session.id)).toEqual([newer.id, older.id]);
  });

  it("stores events per session and notifies subscribers", () => {
    const store = new InMemorySessionStore();
    const session = store.create(initial);
    const other = store.create(initial);
    const perSession = vi.fn();
    const everything = vi.fn();
    const unsubscribe = store.subscribe(session.id, perSession);
    store.subscribeAll(everything);

    store.pushEvent(session.id, "critic", "critique_completed", "Overall 8/10", { phase: "CRITIQUED", iteration: 2 });
    store.pushEvent(other.id, "engine", "session_started", "Started");
    unsubscribe();
    store.pushEvent(session.id, "human", "approval_received", "Approved");

    expect(perSession).toHaveBeenCalledTimes(1);
    expect(everything).toHaveBeenCalledTimes(3);
    const events = store.getEvents(session.id);
    expect(events.map((event) => event.type)).toEqual(["critique_completed", "approval_received"]);
    expect(events[0]).toMatchObject({ role: "critic", phase: "CRITIQUED", iteration: 2, message: "Overall 8/10" });
  });

  it("keeps events recorded before a session is first stored", () => {
    const store = new InMemorySessionStore();
    store.pushEvent("pending-1", "engine", "session_started", "Started");
    store.put({ id: "pending-1", createdAt: "2026-03-01T10:00:00.000Z", updatedAt: "2026-03-01T10:00:00.000Z", state: initial });

    expect(store.getEvents("pending-1").map((event) => event.type)).toEqual(["session_started"]);
  });

  it("deletes sessions together with their events", () => {
    const store = new InMemorySessionStore();
    const session = store.create(initial);
    store.pushEvent(session.id, "engine", "session_started", "Started");

    expect(store.delete(session.id)).toBe(true);
    expect(store.delete(session.id)).toBe(false);
    expect(store.get(session.id)).toBeUndefined();
    expect(store.getEvents(session.id)).toEqual([]);
  });

  it("prunes sessions idle longer than the limit unless busy", () => {
    let nowMs = Date.parse("2026-03-01T10:00:00.000Z");
    const store = new InMemorySessionStore(() => new Date(nowMs));
    const idle = store.create(initial);
    const busy = store.create(initial);
    nowMs += 10_000;
    const fresh = store.create(initial);
    nowMs += 5_000;

    const pruned = store.pruneIdle(12_000, { isBusy: (sessionId) => sessionId === busy.id });

    expect(pruned).toEqual([idle.id]);
    expect(store.list().map((session) => session.id).sort()).toEqual([busy.id, fresh.id].sort());
  });
});
