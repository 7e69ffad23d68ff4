// Session registry.

import type { SessionId } from "@nrepl-lite/wire";

/**
 * Per-session evaluator state.
 *
 * The server never looks inside it; it only creates one per session.
 */
export interface EvaluatorState {
  namespace: string;
  bindings: Map<string, unknown>;
}

/** Fresh evaluator state in the default namespace. */
export function createDefaultState(): EvaluatorState {
  return { namespace: "user", bindings: new Map() };
}

/**
 * Sessions by id.
 *
 * Owned by one server instance and mutated only through {@link dispatch}.
 */
export class SessionRegistry<E = EvaluatorState> {
  private sessions = new Map<SessionId, E>();

  constructor(private readonly createState: () => E) {}

  /** Store fresh state under `id`, replacing any session already there. */
  upsert(id: SessionId): E {
    const state = this.createState();
    this.sessions.set(id, state);
    return state;
  }

  get(id: SessionId): E | undefined {
    return this.sessions.get(id);
  }

  has(id: SessionId): boolean {
    return this.sessions.has(id);
  }

  /** Session ids in the order they were first created. */
  ids(): SessionId[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(): void {
    this.sessions.clear();
  }
}
