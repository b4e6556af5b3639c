import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { AppConfig } from "./types.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const viewportSchema = z
  .string()
  .regex(/^\d+x\d+$/, "expected <width>x<height>")
  .transform((v) => {
    const [width, height] = v.split("x").map((n) => parseInt(n, 10));
    return { width, height };
  });

const configSchema = z.object({
  apiUrl: z.string().url().default("https://api.restful-api.dev/objects"),
  storefrontUrl: z.string().url().default("https://www.amazon.com/"),
  storefrontBrand: z.string().min(1).default("Amazon"),
  headless: booleanFlag.default("true"),
  httpTimeoutMs: z.coerce.number().int().min(100).max(600000).default(10000),
  waitTimeoutMs: z.coerce.number().int().min(100).max(600000).default(5000),
  runTimeoutMs: z.coerce.number().int().min(1000).max(3600000).default(120000),
  concurrency: z.coerce.number().int().min(1).max(32).default(1),
  reportDir: z.string().min(1).default("./data/reports"),
  viewport: viewportSchema.default("1288x711"),
  chromePath: z.string().min(1).optional(),
});

/**
 * Reads runner settings from the environment (and `.env`, via dotenv).
 * Unset keys fall back to defaults; invalid keys are collected into a
 * single ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    apiUrl: env.DAA_API_URL || undefined,
    storefrontUrl: env.DAA_STOREFRONT_URL || undefined,
    storefrontBrand: env.DAA_STOREFRONT_BRAND || undefined,
    headless: env.HEADLESS || undefined,
    httpTimeoutMs: env.DAA_HTTP_TIMEOUT_MS || undefined,
    waitTimeoutMs: env.DAA_WAIT_TIMEOUT_MS || undefined,
    runTimeoutMs: env.DAA_RUN_TIMEOUT_MS || undefined,
    concurrency: env.DAA_CONCURRENCY || undefined,
    reportDir: env.DAA_REPORT_DIR || undefined,
    viewport: env.DAA_VIEWPORT || undefined,
    chromePath: env.CHROME_PATH || undefined,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }

  return result.data;
}

export type { AppConfig, Viewport } from "./types.js";
