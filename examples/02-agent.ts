/**
 * 02-agent: multi-step agent loop run as an evaluation.
 *
 * Each agent step is a "plan" LLM span followed by a "get_weather" tool span,
 * so names repeat and are numbered when the trace ends. Tool inputs are
 * captured from the call arguments, and the evaluation request id is picked
 * up from the ambient execution context.
 *
 * Run: npm run agent --workspace=examples
 */

import { ExecutionContextScope, Spanscope, setSpanChatTools, signed } from "@spanscope/sdk";
import type { TraceHandle } from "@spanscope/sdk";
import { config, sleep } from "./config.js";

const contextScope = new ExecutionContextScope();
const scope = new Spanscope({ ...config, contextScope });

const getWeather = signed(
  { parameters: [{ name: "city" }, { name: "units", hasDefault: true }] },
  async (city: string, units = "celsius") => {
    await sleep(150);
    return { city, units, temperature: city === "Paris" ? 18 : 12 };
  },
);

const weatherTool = {
  type: "function",
  function: {
    name:        "get_weather",
    description: "Current weather for a city",
    parameters:  {
      type:       "object",
      properties: { city: { type: "string" }, units: { type: "string", enum: ["celsius", "fahrenheit"] } },
      required:   ["city"],
    },
  },
};

async function step(trace: TraceHandle, city: string): Promise<void> {
  const llm = trace.span({ name: "plan", type: "llm", provider: "openai", model: "gpt-4o" });
  setSpanChatTools(llm, [weatherTool]);
  await sleep(300);
  llm.end({ inputTokens: 145, outputTokens: 28, totalTokens: 173 });

  const tool = trace.span({ name: "get_weather", type: "tool" });
  tool.captureInputs(getWeather, [city]);
  tool.end({ output: await getWeather(city) });
}

const record = await contextScope.run({ requestId: "eval-row-1", isEvaluate: true }, async () => {
  const trace = scope.trace({ name: "weather-agent", input: { task: "Weather in Paris and London?" } });
  await step(trace, "Paris");
  await step(trace, "London");
  return trace.end({ output: "Paris is 18°C, London is 12°C." });
});

console.log("spans:", record.spans.map((s) => s.name).join(", "));
console.log("usage:", record.usage);
console.log("request id:", record.request_id);
