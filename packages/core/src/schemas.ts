import { z } from "zod";
import type { ZodTypeAny } from "zod";
import { SchemaValidationError } from "./errors.js";

// ── Chat messages ─────────────────────────────────────────────────────────────

export const TextContentPartSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ImageContentPartSchema = z.object({
  type:      z.literal("image_url"),
  image_url: z.object({
    url:    z.string(),
    detail: z.enum(["auto", "low", "high"]).optional(),
  }),
});

export const ContentPartSchema = z.discriminatedUnion("type", [
  TextContentPartSchema,
  ImageContentPartSchema,
]);

export const MessageContentSchema = z.union([z.string(), z.array(ContentPartSchema)]);

export const ToolCallSchema = z.object({
  id:       z.string(),
  type:     z.literal("function"),
  function: z.object({
    name:      z.string().min(1),
    // JSON-encoded arguments, exactly as the model produced them.
    arguments: z.string(),
  }),
});

export const SystemMessageSchema = z.object({
  role:    z.literal("system"),
  content: MessageContentSchema,
  name:    z.string().optional(),
});

export const UserMessageSchema = z.object({
  role:    z.literal("user"),
  content: MessageContentSchema,
  name:    z.string().optional(),
});

export const AssistantMessageSchema = z.object({
  role:       z.literal("assistant"),
  content:    MessageContentSchema.nullable().optional(),
  tool_calls: z.array(ToolCallSchema).optional(),
  refusal:    z.string().optional(),
  name:       z.string().optional(),
});

export const ToolMessageSchema = z.object({
  role:         z.literal("tool"),
  content:      MessageContentSchema,
  tool_call_id: z.string(),
});

export const ChatMessageSchema = z
  .discriminatedUnion("role", [
    SystemMessageSchema,
    UserMessageSchema,
    AssistantMessageSchema,
    ToolMessageSchema,
  ])
  .superRefine((message, ctx) => {
    if (message.role !== "assistant") return;
    const hasContent = message.content !== undefined && message.content !== null;
    if (!hasContent && message.tool_calls === undefined && message.refusal === undefined) {
      ctx.addIssue({
        code:    z.ZodIssueCode.custom,
        path:    ["content"],
        message: "assistant message needs content, tool_calls or refusal",
      });
    }
  });

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ToolCall    = z.infer<typeof ToolCallSchema>;

// ── Chat tools ────────────────────────────────────────────────────────────────

// Property schemas are JSON Schema fragments; keys beyond these are kept as-is.
export const ParamPropertySchema = z
  .object({
    type:        z.enum(["string", "number", "integer", "boolean", "object", "array", "null"]).optional(),
    description: z.string().optional(),
    enum:        z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    items:       z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const FunctionParamsSchema = z.object({
  type:                 z.literal("object").default("object"),
  properties:           z.record(z.string(), ParamPropertySchema),
  required:             z.array(z.string()).optional(),
  additionalProperties: z.boolean().optional(),
});

export const FunctionToolDefinitionSchema = z.object({
  name:        z.string().min(1),
  description: z.string().optional(),
  parameters:  FunctionParamsSchema.optional(),
  strict:      z.boolean().optional(),
});

export const FunctionToolSchema = z.object({
  type:     z.literal("function"),
  function: FunctionToolDefinitionSchema,
});

// New tool kinds are added as further variants of this union.
export const ChatToolSchema = z.discriminatedUnion("type", [FunctionToolSchema]);

export type ChatTool = z.infer<typeof ChatToolSchema>;

// ── Validation ────────────────────────────────────────────────────────────────

function validateEach<S extends ZodTypeAny>(
  schemaName: string,
  schema: S,
  items: unknown,
): z.output<S>[] {
  if (!Array.isArray(items)) {
    throw new SchemaValidationError({
      schema: schemaName,
      index:  0,
      field:  "",
      reason: `expected an array of ${schemaName} objects, received ${items === null ? "null" : typeof items}`,
    });
  }

  const parsed: z.output<S>[] = [];
  items.forEach((item: unknown, index) => {
    const result = schema.safeParse(item);
    if (!result.success) {
      const [first] = result.error.issues;
      throw new SchemaValidationError({
        schema:     schemaName,
        index,
        field:      first ? first.path.join(".") : "",
        reason:     first ? first.message : "invalid value",
        issueCount: result.error.issues.length,
        cause:      result.error,
      });
    }
    parsed.push(result.data);
  });
  return parsed;
}

/**
 * Validate a list of chat messages. Returns the parsed messages, or throws
 * SchemaValidationError for the first element that does not match.
 */
export function validateChatMessages(messages: unknown): ChatMessage[] {
  return validateEach("ChatMessage", ChatMessageSchema, messages);
}

/**
 * Validate a list of chat tool definitions. Returns the parsed tools, or
 * throws SchemaValidationError for the first element that does not match.
 */
export function validateChatTools(tools: unknown): ChatTool[] {
  return validateEach("ChatTool", ChatToolSchema, tools);
}
