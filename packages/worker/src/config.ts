/**
 * Worker configuration
 *
 * YAML file (TOOL_AGENTS_CONFIG, default config/agents.yaml) for per-agent
 * settings, environment (.env via dotenv) for process-level settings.
 * Environment wins over the file.
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import yaml from "js-yaml";
import { z } from "zod";
import { AGENT_CATALOG } from "@tool-agents/agents";
import { DEFAULT_TOOL_TIMEOUT_MS } from "@tool-agents/tools";
import { OperationalError, describeIssues } from "@tool-agents/runtime";

export const DEFAULT_CONFIG_PATH = "config/agents.yaml";
export const DEFAULT_METRICS_PORT = 9090;

// ============================================================================
// SCHEMA
// ============================================================================

const AgentSettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
    cacheTtlMs: z.number().int().nonnegative().optional(),
    rateLimitWindowMs: z.number().int().positive().optional(),
    rateLimitMax: z.number().int().nonnegative().optional(),
    toolTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "fatal"]);

export const WorkerConfigSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  metricsPort: z.number().int().min(0).max(65_535).default(DEFAULT_METRICS_PORT),
  databaseUrl: z.string().min(1).optional(),
  toolTimeoutMs: z.number().int().positive().default(DEFAULT_TOOL_TIMEOUT_MS),
  agents: z.record(AgentSettingsSchema).default({}),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type AgentSettingsConfig = z.infer<typeof AgentSettingsSchema>;

// ============================================================================
// PARSING
// ============================================================================

const EnvNumber = z.coerce.number().int();

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL.toLowerCase();
  if (env.DATABASE_URL) overrides.databaseUrl = env.DATABASE_URL;

  for (const [key, name] of [
    ["metricsPort", "METRICS_PORT"],
    ["toolTimeoutMs", "TOOL_TIMEOUT_MS"],
  ] as const) {
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    const parsed = EnvNumber.safeParse(raw);
    if (!parsed.success) {
      throw new OperationalError(`${name} must be an integer, got "${raw}"`, "INVALID_CONFIG", { [name]: raw });
    }
    overrides[key] = parsed.data;
  }

  return overrides;
}

function parseYaml(text: string, source: string): Record<string, unknown> {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (error) {
    throw new OperationalError(
      `Could not parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      "INVALID_CONFIG",
      { source }
    );
  }

  if (doc === undefined || doc === null) return {};

  const parsed = z.record(z.unknown()).safeParse(doc);
  if (!parsed.success) {
    throw new OperationalError(`${source} must contain a mapping`, "INVALID_CONFIG", { source });
  }
  return parsed.data;
}

/**
 * Merge a YAML document and the environment into a validated config.
 * @throws OperationalError INVALID_CONFIG
 */
export function parseWorkerConfig(
  yamlText: string | undefined,
  env: NodeJS.ProcessEnv = {},
  source = DEFAULT_CONFIG_PATH
): WorkerConfig {
  const fileConfig = yamlText === undefined ? {} : parseYaml(yamlText, source);
  const parsed = WorkerConfigSchema.safeParse({ ...fileConfig, ...fromEnv(env) });

  if (!parsed.success) {
    throw new OperationalError(`Invalid worker config: ${describeIssues(parsed.error)}`, "INVALID_CONFIG", {
      source,
    });
  }

  const known = new Set(AGENT_CATALOG.map((entry) => entry.name));
  const unknown = Object.keys(parsed.data.agents).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new OperationalError(`Unknown agents in ${source}: ${unknown.join(", ")}`, "INVALID_CONFIG", {
      source,
      unknown,
    });
  }

  return parsed.data;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Load .env, then the YAML file if present, and validate.
 */
export function loadWorkerConfig(options: LoadConfigOptions = {}): WorkerConfig {
  const cwd = options.cwd ?? process.cwd();
  if (!options.env) {
    dotenv.config({ path: path.join(cwd, ".env") });
  }
  const env = options.env ?? process.env;

  const configPath = path.resolve(cwd, env.TOOL_AGENTS_CONFIG ?? DEFAULT_CONFIG_PATH);
  const text = fs.existsSync(configPath) ? fs.readFileSync(configPath, "utf-8") : undefined;

  return parseWorkerConfig(text, env, configPath);
}
