// ConversationTranscript: the append-only message history replayed to the
// model on every turn, plus a staging view for in-flight turns.

import type {
  AssistantMessage,
  InvocationRequest,
  Message,
  SystemMessage,
  ToolMessage,
  UserMessage,
} from "./types";

function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

export function systemMessage(content: string): SystemMessage {
  return { id: generateId(), role: "system", content, timestamp: Date.now() };
}

export function userMessage(content: string): UserMessage {
  return { id: generateId(), role: "user", content, timestamp: Date.now() };
}

export function assistantMessage(
  content: string,
  toolCalls?: readonly InvocationRequest[],
): AssistantMessage {
  const message: AssistantMessage = { id: generateId(), role: "assistant", content, timestamp: Date.now() };
  return toolCalls && toolCalls.length > 0 ? { ...message, toolCalls: [...toolCalls] } : message;
}

export function toolMessage(
  toolCallId: string,
  toolName: string,
  content: string,
  isError = false,
): ToolMessage {
  const message: ToolMessage = {
    id: generateId(),
    role: "tool",
    content,
    timestamp: Date.now(),
    toolCallId,
    toolName,
  };
  return isError ? { ...message, isError } : message;
}

/** Anything messages can be appended to: the transcript itself or a staged turn. */
export interface TranscriptWriter {
  append(message: Message): void;
  asList(): readonly Message[];
}

/**
 * Invocation ids requested by an assistant message that no tool message
 * has answered yet, in request order.
 */
export function pendingInvocationIds(messages: readonly Message[]): string[] {
  const pending: string[] = [];
  for (const message of messages) {
    if (message.role === "assistant") {
      for (const call of message.toolCalls ?? []) pending.push(call.id);
    } else if (message.role === "tool") {
      const index = pending.indexOf(message.toolCallId);
      if (index !== -1) pending.splice(index, 1);
    }
  }
  return pending;
}

export class ConversationTranscript implements TranscriptWriter {
  private readonly messages: Message[] = [];

  constructor(initial: readonly Message[] = []) {
    for (const message of initial) this.append(message);
  }

  append(message: Message): void {
    this.messages.push(message);
  }

  asList(): readonly Message[] {
    return [...this.messages];
  }

  get length(): number {
    return this.messages.length;
  }

  pendingInvocationIds(): string[] {
    return pendingInvocationIds(this.messages);
  }

  /** Start staging a turn. Nothing reaches the transcript until commit(). */
  begin(): TranscriptTurn {
    return new TranscriptTurn(this);
  }
}

/**
 * Messages added during one turn. The model sees committed history followed
 * by the staged messages; a turn that is never committed leaves the
 * transcript exactly as it was.
 */
export class TranscriptTurn implements TranscriptWriter {
  private readonly staged: Message[] = [];
  private committed = false;

  constructor(private readonly transcript: ConversationTranscript) {}

  append(message: Message): void {
    if (this.committed) {
      throw new Error("Cannot append to a committed turn");
    }
    this.staged.push(message);
  }

  asList(): readonly Message[] {
    return [...this.transcript.asList(), ...this.staged];
  }

  get stagedCount(): number {
    return this.staged.length;
  }

  commit(): void {
    if (this.committed) return;
    for (const message of this.staged) this.transcript.append(message);
    this.committed = true;
  }
}
