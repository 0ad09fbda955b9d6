import { SpanAttributeKey, validateChatMessages, validateChatTools } from "@spanscope/core";
import type { AttributeTarget, ChatMessage, ChatTool } from "@spanscope/core";

/**
 * Record the chat messages of an LLM call on a span.
 *
 * Every message is validated first; if any fails, SchemaValidationError is
 * thrown and the span is left as it was. With `append`, the messages are
 * added after those already recorded; otherwise they replace them.
 *
 * @example
 * ```ts
 * setSpanChatMessages(span, [{ role: "user", content: "what is 1 + 1?" }]);
 * setSpanChatMessages(span, [{ role: "assistant", content: "2" }], true);
 * ```
 */
export function setSpanChatMessages(
  span: AttributeTarget,
  messages: readonly unknown[],
  append = false,
): void {
  const parsed = validateChatMessages(messages);

  let next: unknown[] = parsed;
  if (append) {
    const existing = span.getAttribute(SpanAttributeKey.CHAT_MESSAGES);
    if (Array.isArray(existing)) next = [...existing, ...parsed];
  }
  span.setAttribute(SpanAttributeKey.CHAT_MESSAGES, next);
}

/**
 * Record the tools offered to an LLM call on a span, replacing any
 * recorded before. Throws SchemaValidationError, leaving the span as it
 * was, if any tool is invalid.
 */
export function setSpanChatTools(span: AttributeTarget, tools: readonly unknown[]): void {
  const parsed = validateChatTools(tools);
  span.setAttribute(SpanAttributeKey.CHAT_TOOLS, parsed);
}

/** Recorded chat messages, or undefined when none were set. */
export function getSpanChatMessages(span: AttributeTarget): ChatMessage[] | undefined {
  const value = span.getAttribute(SpanAttributeKey.CHAT_MESSAGES);
  return value === undefined ? undefined : validateChatMessages(value);
}

/** Recorded chat tools, or undefined when none were set. */
export function getSpanChatTools(span: AttributeTarget): ChatTool[] | undefined {
  const value = span.getAttribute(SpanAttributeKey.CHAT_TOOLS);
  return value === undefined ? undefined : validateChatTools(value);
}
