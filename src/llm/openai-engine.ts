import OpenAI from "openai";
import { z } from "zod";
import { renderGoal } from "../prompt/system-prompt.js";
import type {
  ContentItem,
  InvocationResult,
  ReasoningEngine,
  ReasoningStep,
  ToolDefinition,
  Turn,
} from "../types.js";

/**
 * OpenAI-compatible reasoning engine.
 * Works with OpenAI and any endpoint that speaks the chat-completions API
 * with function calling.
 *
 * A reply with tool calls becomes an "actions" step; a plain text reply is
 * taken as the final answer.
 */
export class OpenAIEngine implements ReasoningEngine {
  private client: OpenAI;
  private model: string;
  private maxTokens: number;

  constructor(options: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    maxTokens?: number;
  }) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async reason(
    transcript: readonly Turn[],
    tools: readonly ToolDefinition[],
  ): Promise<ReasoningStep> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: toChatMessages(transcript),
      tools: tools.length > 0 ? toChatTools(tools) : undefined,
      max_tokens: this.maxTokens,
    });

    const message = response.choices[0]?.message;
    if (!message) {
      throw new Error("Reasoning engine returned no choices");
    }
    return fromChatReply(message);
  }
}

// ---------------------------------------------------------------------------
// Mapping between transcript turns and chat messages
// ---------------------------------------------------------------------------

/** The part of a chat-completion reply the engine reads */
export interface ChatReply {
  content: string | null;
  tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
}

export function toChatTools(tools: readonly ToolDefinition[]): OpenAI.ChatCompletionFunctionTool[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: { ...z.toJSONSchema(t.parameters, { unrepresentable: "any" }) },
    },
  }));
}

function toContentParts(items: readonly ContentItem[]): OpenAI.ChatCompletionContentPart[] {
  return items.map((item) =>
    item.type === "text"
      ? { type: "text" as const, text: item.text }
      : {
          type: "image_url" as const,
          image_url: { url: `data:${item.mimeType};base64,${item.data}` },
        },
  );
}

function describeResult(result: InvocationResult): string {
  if (result.failure) {
    return `ERROR (${result.failure.kind}): ${result.failure.message}`;
  }
  if (result.payload === undefined) return result.description;
  return `${result.description}\n${JSON.stringify(result.payload)}`;
}

/**
 * Consecutive reasoning + invocation turns fold into one assistant message
 * carrying the tool calls; each result becomes a `tool` message.
 */
export function toChatMessages(transcript: readonly Turn[]): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [];
  let pending: { content: string | null; calls: OpenAI.ChatCompletionMessageToolCall[] } | null =
    null;

  const flush = () => {
    if (!pending) return;
    if (pending.calls.length > 0) {
      messages.push({ role: "assistant", content: pending.content, tool_calls: pending.calls });
    } else if (pending.content) {
      messages.push({ role: "assistant", content: pending.content });
    }
    pending = null;
  };

  for (const turn of transcript) {
    switch (turn.kind) {
      case "reasoning":
        flush();
        pending = { content: turn.text, calls: [] };
        break;
      case "invocation":
        pending ??= { content: null, calls: [] };
        pending.calls.push({
          id: turn.request.id,
          type: "function",
          function: {
            name: turn.request.name,
            arguments:
              typeof turn.request.arguments === "string"
                ? turn.request.arguments
                : JSON.stringify(turn.request.arguments ?? {}),
          },
        });
        break;
      case "result":
        flush();
        messages.push({
          role: "tool",
          tool_call_id: turn.result.requestId,
          content: describeResult(turn.result),
        });
        break;
      case "system":
        flush();
        messages.push({ role: "system", content: turn.text });
        break;
      case "goal":
        flush();
        messages.push({ role: "user", content: renderGoal(turn.mode, turn.text) });
        break;
      case "note":
        flush();
        messages.push({ role: "user", content: turn.text });
        break;
      case "observation":
        flush();
        messages.push({ role: "user", content: toContentParts(turn.content) });
        break;
      case "answer":
        flush();
        messages.push({ role: "assistant", content: turn.text });
        break;
    }
  }
  flush();
  return messages;
}

/** Tool-call arguments are JSON text; unparsable text is passed on as-is for the dispatcher to reject */
function parseArguments(raw: string): unknown {
  if (raw.trim() === "") return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function fromChatReply(reply: ChatReply): ReasoningStep {
  const thinking = reply.content ?? undefined;
  if (reply.tool_calls && reply.tool_calls.length > 0) {
    return {
      type: "actions",
      thinking,
      requests: reply.tool_calls.map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: parseArguments(tc.function.arguments),
      })),
    };
  }
  return { type: "final", answer: reply.content ?? "" };
}
