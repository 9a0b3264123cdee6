import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { AgentRole, PitchState, Session, SessionEvent, WorkflowPhase } from "../types";

interface EventOptions {
  phase?: WorkflowPhase;
  iteration?: number;
  data?: Record<string, unknown>;
}

/**
 * Keyed session persistence. Events may be recorded for an id before its
 * session is first stored. `get` after `put` on the same id returns the
 * latest value; nothing is promised about ordering across ids.
 */
export interface SessionStore {
  create(state: PitchState): Session;
  get(sessionId: string): Session | undefined;
  put(session: Session): void;
  delete(sessionId: string): boolean;
  list(): Session[];
  pushEvent(sessionId: string, role: AgentRole, type: string, message: string, options?: EventOptions): SessionEvent;
  getEvents(sessionId: string): SessionEvent[];
  subscribe(sessionId: string, handler: (event: SessionEvent) => void): () => void;
  subscribeAll(handler: (event: SessionEvent) => void): () => void;
  pruneIdle(maxIdleMs: number, options?: PruneOptions): string[];
}

export interface PruneOptions {
  nowMs?: number;
  /** Sessions reported busy are kept even when idle. */
  isBusy?: (sessionId: string) => boolean;
}

const ALL_EVENTS = "session:*";

// Values cross the store boundary as copies so a caller can never edit stored state in place.
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly events = new Map<string, SessionEvent[]>();
  private readonly emitter = new EventEmitter();

  constructor(private readonly now: () => Date = () => new Date()) {
    this.emitter.setMaxListeners(0);
  }

  create(state: PitchState): Session {
    const timestamp = this.now().toISOString();
    const session: Session = {
      id: randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
      state: structuredClone(state)
    };
    this.sessions.set(session.id, session);
    this.events.set(session.id, []);
    return structuredClone(session);
  }

  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  put(session: Session): void {
    this.sessions.set(session.id, structuredClone(session));
    if (!this.events.has(session.id)) {
      this.events.set(session.id, []);
    }
  }

  delete(sessionId: string): boolean {
    this.events.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  list(): Session[] {
    return [...this.sessions.values()]
      .sort((a, b) => (a.createdAt > b.createdAt ? -1 : a.createdAt < b.createdAt ? 1 : 0))
      .map((session) => structuredClone(session));
  }

  pushEvent(sessionId: string, role: AgentRole, type: string, message: string, options: EventOptions = {}): SessionEvent {
    const event: SessionEvent = {
      id: randomUUID(),
      sessionId,
      timestamp: this.now().toISOString(),
      role,
      type,
      message,
      phase: options.phase,
      iteration: options.iteration,
      data: options.data
    };
    const list = this.events.get(sessionId) ?? [];
    list.push(event);
    this.events.set(sessionId, list);
    this.emitter.emit(`session:${sessionId}`, event);
    this.emitter.emit(ALL_EVENTS, event);
    return event;
  }

  getEvents(sessionId: string): SessionEvent[] {
    return [...(this.events.get(sessionId) ?? [])];
  }

  subscribe(sessionId: string, handler: (event: SessionEvent) => void): () => void {
    const channel = `session:${sessionId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  subscribeAll(handler: (event: SessionEvent) => void): () => void {
    this.emitter.on(ALL_EVENTS, handler);
    return () => this.emitter.off(ALL_EVENTS, handler);
  }

  pruneIdle(maxIdleMs: number, options: PruneOptions = {}): string[] {
    const nowMs = options.nowMs ?? this.now().getTime();
    const pruned: string[] = [];
    for (const [id, session] of this.sessions.entries()) {
      if (options.isBusy?.(id)) continue;
      if (nowMs - new Date(session.updatedAt).getTime() > maxIdleMs) {
        pruned.push(id);
      }
    }
    for (const id of pruned) {
      this.delete(id);
    }
    return pruned;
  }
}
