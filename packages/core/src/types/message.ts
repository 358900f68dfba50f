// Message types: the role-tagged entries of a conversation transcript

import type { InvocationRequest } from "./capability";

interface MessageBase {
  readonly id: string;
  readonly content: string;
  readonly timestamp: number;
}

export interface SystemMessage extends MessageBase {
  readonly role: "system";
}

export interface UserMessage extends MessageBase {
  readonly role: "user";
}

export interface AssistantMessage extends MessageBase {
  readonly role: "assistant";
  /** Invocations the model requested in this message. Absent for plain answers. */
  readonly toolCalls?: readonly InvocationRequest[];
}

export interface ToolMessage extends MessageBase {
  readonly role: "tool";
  /** Links the result back to the assistant's invocation request. */
  readonly toolCallId: string;
  readonly toolName: string;
  readonly isError?: boolean;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type Role = Message["role"];
