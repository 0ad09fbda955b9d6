import { describe, it, expect } from "vitest";
import { validateChatMessages, validateChatTools } from "../schemas.js";
import { SchemaValidationError } from "../errors.js";

const addTool = {
  type: "function",
  function: {
    name: "add",
    description: "Add two numbers",
    parameters: {
      type: "object",
      properties: {
        a: { type: "number" },
        b: { type: "number" },
      },
      required: ["a", "b"],
    },
  },
};

function catchValidationError(fn: () => unknown): SchemaValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchemaValidationError) return err;
    throw err;
  }
  throw new Error("expected a SchemaValidationError");
}

describe("validateChatMessages", () => {
  it("accepts system, user, assistant and tool messages", () => {
    const messages = [
      { role: "system", content: "please use the provided tool to answer the user's questions" },
      { role: "user", content: "what is 1 + 1?" },
      {
        role: "assistant",
        tool_calls: [
          { id: "123", type: "function", function: { name: "add", arguments: '{"a": 1,"b": 2}' } },
        ],
      },
      { role: "tool", content: "2", tool_call_id: "123" },
      { role: "assistant", content: "1 + 1 = 2" },
    ];
    expect(validateChatMessages(messages)).toEqual(messages);
  });

  it("accepts content parts", () => {
    const messages = [{
      role: "user",
      content: [
        { type: "text", text: "what is in this picture?" },
        { type: "image_url", image_url: { url: "https://example.com/cat.png", detail: "low" } },
      ],
    }];
    expect(validateChatMessages(messages)).toEqual(messages);
  });

  it("rejects a message without a role", () => {
    const validation = catchValidationError(() => validateChatMessages([{ invalid_field: "user", content: "hello" }]));
    expect(validation.schema).toBe("ChatMessage");
    expect(validation.index).toBe(0);
    expect(validation.field).toBe("role");
    expect(validation.message).toMatch(/^1 validation error for ChatMessage at index 0: field "role"/);
  });

  it("reports the index and path of the first invalid element", () => {
    const messages = [
      { role: "user", content: "hi" },
      { role: "assistant", tool_calls: [{ id: "1", type: "function", function: { name: "add" } }] },
    ];
    const err = catchValidationError(() => validateChatMessages(messages));
    expect(err.index).toBe(1);
    expect(err.field).toBe("tool_calls.0.function.arguments");
  });

  it("rejects an assistant message with neither content nor tool calls", () => {
    const err = catchValidationError(() => validateChatMessages([{ role: "assistant" }]));
    expect(err.field).toBe("content");
    expect(err.reason).toBe("assistant message needs content, tool_calls or refusal");
  });

  it("rejects a tool message without tool_call_id", () => {
    const err = catchValidationError(() => validateChatMessages([{ role: "tool", content: "2" }]));
    expect(err.field).toBe("tool_call_id");
  });

  it("rejects input that is not an array", () => {
    const err = catchValidationError(() => validateChatMessages({ role: "user", content: "hi" }));
    expect(err).toBeInstanceOf(SchemaValidationError);
    expect(err.field).toBe("");
  });

  it("strips unknown keys from valid messages", () => {
    expect(validateChatMessages([{ role: "user", content: "hi", extra: 1 }])).toEqual([{ role: "user", content: "hi" }]);
  });
});

describe("validateChatTools", () => {
  it("accepts function tools", () => {
    expect(validateChatTools([addTool])).toEqual([addTool]);
  });

  it("keeps extra JSON Schema keys on parameter properties", () => {
    const tool = {
      type: "function",
      function: {
        name: "search",
        parameters: {
          type: "object",
          properties: { limit: { type: "integer", minimum: 1, default: 10 } },
        },
      },
    };
    expect(validateChatTools([tool])).toEqual([tool]);
  });

  it("defaults the parameters type to object", () => {
    const tool = {
      type: "function",
      function: { name: "search", parameters: { properties: { query: { type: "string" } } } },
    };
    expect(validateChatTools([tool])).toEqual([
      {
        type: "function",
        function: { name: "search", parameters: { type: "object", properties: { query: { type: "string" } } } },
      },
    ]);
  });

  it("rejects an unsupported tool type", () => {
    const tools = [{ type: "unsupported_function", unsupported_function: { name: "test" } }];
    const validation = catchValidationError(() => validateChatTools(tools));
    expect(validation.schema).toBe("ChatTool");
    expect(validation.index).toBe(0);
    expect(validation.field).toBe("type");
    expect(validation.message).toContain("validation error for ChatTool");
  });

  it("rejects a function tool without a name", () => {
    const err = catchValidationError(() => validateChatTools([addTool, { type: "function", function: {} }]));
    expect(err.index).toBe(1);
    expect(err.field).toBe("function.name");
  });
});
