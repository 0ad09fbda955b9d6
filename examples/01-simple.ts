/**
 * 01-simple: one trace, one LLM span with chat messages.
 *
 * The simplest possible usage: ask a question, get an answer.
 * Run: npm run simple --workspace=examples
 */

import { Spanscope, setSpanChatMessages } from "@spanscope/sdk";
import { config, sleep } from "./config.js";

const scope = new Spanscope(config);

const question = "What is the capital of France?";

const trace = scope.trace({
  name:  "simple-chat",
  input: { question },
});

console.log("trace started:", trace.id);

const span = trace.span({
  name:     "chat-completion",
  type:     "llm",
  provider: "openai",
  model:    "gpt-4o",
});
setSpanChatMessages(span, [{ role: "user", content: question }]);

// Simulate the LLM call
await sleep(450);

const answer = "The capital of France is Paris.";

setSpanChatMessages(span, [{ role: "assistant", content: answer }], true);
span.end({
  output:       { role: "assistant", content: answer },
  inputTokens:  22,
  outputTokens: 10,
  totalTokens:  32,
});

const record = trace.end({ output: answer });

console.log(JSON.stringify(record, null, 2));
