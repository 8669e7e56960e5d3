import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { compareDocuments } from "../engine/equal.js";
import { createPolicy, mergePolicies, type NormalizationPolicy } from "../engine/policy.js";
import { planJsonAttribute } from "../plan/attribute.js";
import type { PlanValue } from "../types/workflow.js";
import type { JsonError } from "../types/value.js";
import { canonicalize } from "../utils/canonical.js";
import { logger, requestLogger, serializeError, getRequestId } from "./logger.js";

export interface AppOptions {
  apiPrefix: string;
  apiKey: string;
  maxDepth: number;
  policy: NormalizationPolicy;
  /** Requests per minute per client on the API router. */
  rateLimitPerMinute?: number;
}

function errorBody(error: JsonError) {
  return {
    error: error.code,
    message: error.message,
    ...(error.position !== undefined ? { position: error.position } : {}),
  };
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/** Body values for plan attributes: strings, null, or absent (= unknown). */
function planValueFrom(value: unknown): PlanValue | undefined {
  if (typeof value === "string" || value === null) return value;
  return undefined;
}

export function createApp(options: AppOptions) {
  const app = express();
  const { apiPrefix, apiKey, maxDepth, policy } = options;

  // per-request policy: the configured fields plus any the caller adds
  const policyFor = (extra: unknown): NormalizationPolicy | null => {
    if (extra === undefined) return policy;
    if (!isStringList(extra)) return null;
    return mergePolicies(policy, createPolicy(extra));
  };

  app.use(requestLogger);
  app.use(cors({ origin: true, credentials: false }));
  app.use(express.json({ limit: "2mb" }));

  app.get("/healthz", (_req, res) => {
    res.json({
      ok: true,
      maxDepth,
      optionalFields: Array.from(policy.optionalFields).sort(),
    });
  });

  // API gateway with rate limiting
  const api = express.Router();
  api.use(rateLimit({ windowMs: 60_000, limit: options.rateLimitPerMinute ?? 120 }));
  api.use((req, res, next) => {
    if (!apiKey) return next();
    const got = req.header("X-Api-Key");
    if (got === apiKey) return next();
    return res.status(401).json({ error: "unauthorized" });
  });

  api.post("/equal", (req, res) => {
    const a: unknown = req.body?.a;
    const b: unknown = req.body?.b;
    if (typeof a !== "string" || typeof b !== "string") {
      return res.status(400).json({ error: "a_and_b_required" });
    }
    const effective = policyFor(req.body?.optionalFields);
    if (!effective) return res.status(400).json({ error: "invalid_optional_fields" });

    const result = compareDocuments(a, b, effective, { maxDepth });
    if (result.errors.a || result.errors.b) {
      logger.warn("Unparsable document treated as different", {
        requestId: getRequestId(res),
        a: result.errors.a?.message,
        b: result.errors.b?.message,
      });
    }
    res.json({
      equal: result.equal,
      ...(result.errors.a ? { errorA: errorBody(result.errors.a) } : {}),
      ...(result.errors.b ? { errorB: errorBody(result.errors.b) } : {}),
    });
  });

  api.post("/canonicalize", (req, res) => {
    const text: unknown = req.body?.text;
    if (typeof text !== "string") return res.status(400).json({ error: "text_required" });

    const result = canonicalize(text, { maxDepth });
    if (!result.ok) return res.status(422).json(errorBody(result.error));
    res.json({ canonical: result.value });
  });

  api.post("/plan", (req, res) => {
    const state = planValueFrom(req.body?.state);
    const config = planValueFrom(req.body?.config);
    if (state === undefined || config === undefined) {
      return res.status(400).json({ error: "state_and_config_required" });
    }
    // the planned value defaults to the configured one
    const plan = req.body?.plan === undefined ? config : planValueFrom(req.body.plan);
    if (plan === undefined) return res.status(400).json({ error: "invalid_plan" });

    const effective = policyFor(req.body?.optionalFields);
    if (!effective) return res.status(400).json({ error: "invalid_optional_fields" });

    const out = planJsonAttribute({ state, config, plan }, effective, { maxDepth });
    res.json(out);
  });

  app.use(apiPrefix, api);

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });

  // body-parser failures and anything thrown by a handler
  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status =
      typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
        ? error.status
        : 500;
    if (status >= 500) {
      logger.error("Unhandled request error", { requestId: getRequestId(res), error: serializeError(error) });
      return res.status(status).json({ error: "internal_error" });
    }
    res.status(status).json({ error: "bad_request", message: error instanceof Error ? error.message : String(error) });
  });

  return app;
}
