/**
 * Environment configuration.
 *
 * Read from process.env (the CLI loads a .env file first). Every variable is
 * optional; an invalid value raises ConfigError naming each bad variable.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { isValidTimeZone } from "./dates.js";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  MODEL_NAME: z.string().trim().min(1).default("gpt-4.1"),
  MODEL_BASE_URL: z.string().url().optional(),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  AGENT_MAX_ROUND_TRIPS: z.coerce.number().int().positive().default(10),
  TASKS_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "Unknown IANA time zone" }),
  TASK_STORE_URL: z.string().url().optional(),
  TASK_STORE_API_KEY: optionalString,
});

export interface AppConfig {
  model: {
    name: string;
    apiKey?: string;
    baseUrl?: string;
    temperature: number;
    timeoutMs: number;
  };
  agent: {
    maxRoundTrips: number;
    timeZone: string;
  };
  taskStore?: {
    url: string;
    apiKey?: string;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    model: {
      name: vars.MODEL_NAME,
      apiKey: vars.OPENROUTER_API_KEY ?? vars.OPENAI_API_KEY,
      baseUrl: vars.MODEL_BASE_URL,
      temperature: vars.MODEL_TEMPERATURE,
      timeoutMs: vars.MODEL_TIMEOUT_MS,
    },
    agent: {
      maxRoundTrips: vars.AGENT_MAX_ROUND_TRIPS,
      timeZone: vars.TASKS_TIMEZONE,
    },
    taskStore: vars.TASK_STORE_URL
      ? { url: vars.TASK_STORE_URL, apiKey: vars.TASK_STORE_API_KEY }
      : undefined,
  };
}
