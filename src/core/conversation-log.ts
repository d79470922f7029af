import type { Message, ToolCall } from '../models/base.js';

/**
 * Append-only conversation for one run. Entries are never removed or
 * reordered; readers get copies.
 */
export class ConversationLog {
  private messages: Message[] = [];

  append(message: Message): void {
    this.messages.push(clone(message));
  }

  system(content: string): void {
    this.append({ role: 'system', content });
  }

  user(content: string): void {
    this.append({ role: 'user', content });
  }

  assistantCall(content: string, call: ToolCall): void {
    this.append({ role: 'assistant', content, tool_calls: [call] });
  }

  toolResult(toolCallId: string, content: string): void {
    this.append({ role: 'tool', content, tool_call_id: toolCallId });
  }

  entries(): Message[] {
    return this.messages.map(clone);
  }

  get length(): number {
    return this.messages.length;
  }
}

function clone(message: Message): Message {
  const copy: Message = { ...message };
  if (message.tool_calls) {
    copy.tool_calls = message.tool_calls.map((call) => ({ ...call, function: { ...call.function } }));
  }
  return copy;
}
