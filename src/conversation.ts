import type { LoopMode, OutcomeStatus, SessionRecord, Turn } from "./types.js";

/**
 * Conversation — the agent's transcript.
 *
 * Append-only while a loop runs; survives across do/tell/check calls on the
 * same agent until `reset()`. Turn order is causal: a result must follow the
 * invocation it answers, within the same session.
 */
export class Conversation {
  private turns: Turn[] = [];
  private sessions: SessionRecord[] = [];
  /** Invocation ids of the open session still waiting for a result */
  private pending = new Set<string>();

  /** Start a new session and return its index */
  beginSession(mode: LoopMode, goal: string): number {
    const index = this.sessions.length;
    this.sessions.push({ index, mode, goal });
    this.pending.clear();
    return index;
  }

  /** Record how a session ended */
  closeSession(index: number, status: OutcomeStatus, feedback: string): void {
    const record = this.sessions[index];
    if (!record) throw new Error(`Unknown session ${index}`);
    this.sessions[index] = { ...record, status, feedback };
  }

  append(turn: Turn): void {
    if (turn.session !== this.sessions.length - 1) {
      throw new Error(`Turn for session ${turn.session} appended outside its session`);
    }
    if (turn.kind === "invocation") {
      if (this.pending.has(turn.request.id)) {
        throw new Error(`Invocation id "${turn.request.id}" is already awaiting a result`);
      }
      this.pending.add(turn.request.id);
    } else if (turn.kind === "result") {
      if (!this.pending.delete(turn.result.requestId)) {
        throw new Error(`Result for "${turn.result.requestId}" has no pending invocation`);
      }
    }
    this.turns.push(Object.freeze(turn));
  }

  /** Read-only copy of the full transcript */
  entries(): Turn[] {
    return [...this.turns];
  }

  /** Turns of one session, in order */
  sessionTurns(index: number): Turn[] {
    return this.turns.filter((t) => t.session === index);
  }

  /** Every session record so far, oldest first */
  sessionRecords(): SessionRecord[] {
    return this.sessions.map((s) => ({ ...s }));
  }

  /** Last `count` turns, for diagnostics */
  tail(count: number): Turn[] {
    return count > 0 ? this.turns.slice(-count) : [];
  }

  get length(): number {
    return this.turns.length;
  }

  reset(): void {
    this.turns = [];
    this.sessions = [];
    this.pending.clear();
  }
}

/**
 * Action log: one line per reasoning text, one indented line per result.
 *
 *   - I'll add the numbers
 *     - Added 2 + 3 = 5
 *     - add (invalid_arguments) [FAILED: Invalid arguments: b: ...]
 */
export function summarizeActions(turns: readonly Turn[]): string {
  const lines: string[] = [];
  for (const turn of turns) {
    if (turn.kind === "reasoning") {
      const [first, ...rest] = turn.text.trim().split("\n");
      lines.push(`- ${first}`);
      for (const line of rest) lines.push(`  ${line}`);
    } else if (turn.kind === "result") {
      const { result } = turn;
      lines.push(
        result.failure
          ? `  - ${result.description} [FAILED: ${result.failure.message}]`
          : `  - ${result.description}`,
      );
    }
  }
  return lines.join("\n");
}
