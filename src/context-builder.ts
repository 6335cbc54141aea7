import type { Conversation } from "./conversation.js";
import { summarizeActions } from "./conversation.js";
import { DEFAULT_SYSTEM_PROMPT, formatPreviousTasks } from "./prompt/system-prompt.js";
import type { ContentItem, Turn } from "./types.js";

/**
 * ContextBuilder — decides what the reasoning engine sees on each call.
 *
 * The conversation keeps everything; the view handed to the engine is:
 *   1. the system prompt
 *   2. a "Previous tasks" note for earlier sessions on this agent
 *   3. the current session's seeding turns (goal + first observation)
 *   4. iterations older than the recent window, compacted into an action log
 *   5. the recent iterations in full, minus content past its lifespan
 */

export interface MemoryConfig {
  /** Iterations kept in full; older ones are compacted into a summary */
  recentWindow: number;
}

export interface ContextBuilderOptions {
  systemPrompt?: string;
  memory?: Partial<MemoryConfig>;
}

const DEFAULT_RECENT_WINDOW = 5;

export class ContextBuilder {
  private systemPrompt: string;
  private recentWindow: number;

  constructor(options: ContextBuilderOptions = {}) {
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.recentWindow = options.memory?.recentWindow ?? DEFAULT_RECENT_WINDOW;
    if (!Number.isInteger(this.recentWindow) || this.recentWindow < 1) {
      throw new Error(`memory.recentWindow must be a positive integer, got ${this.recentWindow}`);
    }
  }

  /**
   * Build the transcript for the reasoning call of `iteration` (1-based) in
   * `session`.
   */
  build(conversation: Conversation, session: number, iteration: number): Turn[] {
    const view: Turn[] = [{ kind: "system", session, iteration: 0, text: this.systemPrompt }];

    const previous = conversation
      .sessionRecords()
      .filter((r) => r.index < session && r.status !== undefined);
    if (previous.length > 0) {
      view.push({ kind: "note", session, iteration: 0, text: formatPreviousTasks(previous) });
    }

    const turns = conversation.sessionTurns(session);
    const iterations = [...new Set(turns.map((t) => t.iteration).filter((i) => i > 0))];
    const recent = new Set(iterations.slice(-this.recentWindow));
    const compacted = turns.filter((t) => t.iteration > 0 && !recent.has(t.iteration));

    for (const turn of turns) {
      if (turn.iteration === 0) view.push(...this.visible(turn, iteration));
    }

    const summary = summarizeActions(compacted);
    if (summary) {
      const lastCompacted = compacted[compacted.length - 1].iteration;
      view.push({
        kind: "note",
        session,
        iteration: lastCompacted,
        text: `Previous actions in this session:\n${summary}`,
      });
    }

    for (const turn of turns) {
      if (recent.has(turn.iteration)) view.push(...this.visible(turn, iteration));
    }

    return view;
  }

  /** Drop observation items whose lifespan has run out by `iteration` */
  private visible(turn: Turn, iteration: number): Turn[] {
    if (turn.kind !== "observation") return [turn];

    // 0 = produced right before this reasoning call, 1 = one iteration earlier, ...
    const age = iteration - 1 - turn.iteration;
    const content = turn.content.filter((item: ContentItem) =>
      item.lifespan === undefined || age < item.lifespan,
    );
    if (content.length === 0) return [];
    return content.length === turn.content.length ? [turn] : [{ ...turn, content }];
  }
}
