/**
 * src/config/index.ts
 * Runtime configuration from the environment. Entry points load .env via
 * `dotenv/config` before calling loadConfig().
 */

import { createPolicy, mergePolicies, type NormalizationPolicy } from "../engine/policy.js";
import { loadPolicyFile } from "../schema/index.js";
import { isLogLevel, logger, type LogLevel } from "../server/logger.js";
import { DEFAULT_MAX_DEPTH, MAX_SUPPORTED_DEPTH } from "../value/model.js";

export interface AppConfig {
  logLevel: LogLevel;
  port: number;
  apiPrefix: string;
  apiKey: string;
  maxDepth: number;
  optionalFields: string[];
  policyFile?: string;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const rawLevel = (env.LOG_LEVEL || "info").toLowerCase();
  return {
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    port: positiveInt(env, "PORT", 3000, 65535),
    apiPrefix: env.API_PREFIX || "/api/v1",
    apiKey: env.API_KEY || "",
    maxDepth: positiveInt(env, "SEMJSON_MAX_DEPTH", DEFAULT_MAX_DEPTH, MAX_SUPPORTED_DEPTH),
    optionalFields: splitList(env.SEMJSON_OPTIONAL_FIELDS),
    policyFile: env.SEMJSON_POLICY_FILE || undefined,
  };
}

export function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function positiveInt(env: Env, name: string, fallback: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1 || n > max) {
    logger.warn(`Ignoring invalid ${name}; using default`, { value: raw, default: fallback, max });
    return fallback;
  }
  return n;
}

export interface ResolvedPolicy {
  policy: NormalizationPolicy;
  maxDepth: number;
}

/** Env fields plus, when configured, the policy file (its maxDepth wins). */
export async function resolvePolicy(config: AppConfig): Promise<ResolvedPolicy> {
  const fromEnv = createPolicy(config.optionalFields);
  if (!config.policyFile) return { policy: fromEnv, maxDepth: config.maxDepth };

  const loaded = await loadPolicyFile(config.policyFile);
  return {
    policy: mergePolicies(fromEnv, loaded.policy),
    maxDepth: loaded.maxDepth ?? config.maxDepth,
  };
}
