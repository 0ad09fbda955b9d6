import { config as loadEnv } from "dotenv";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import type { SpanscopeOptions } from "@spanscope/sdk";

// Load examples/.env relative to this file, so the path is correct
// regardless of which directory you run the script from.
loadEnv({ path: join(dirname(fileURLToPath(import.meta.url)), ".env") });

// SPANSCOPE_* settings (log level, input capture, environment) are read
// from the loaded environment by the SDK itself.
export const config: SpanscopeOptions = {
  env: process.env,
};

export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));
