/**
 * src/cli/program.ts
 * `semjson` commands. I/O goes through CliIO so the program can be driven
 * in-process.
 *
 * Exit codes:
 *   0 = equal / ok
 *   1 = different (equal, plan with a real change)
 *   2 = unreadable input, invalid policy, or (canonicalize) malformed JSON
 */

import fs from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { resolvePolicy, splitList, type AppConfig } from "../config/index.js";
import { compareDocuments } from "../engine/equal.js";
import {
  createPolicy,
  isPolicyPresetName,
  mergePolicies,
  POLICY_PRESETS,
  type NormalizationPolicy,
} from "../engine/policy.js";
import { planJsonAttribute } from "../plan/attribute.js";
import { logger, serializeError, setLogLevel } from "../server/logger.js";
import { canonicalize } from "../utils/canonical.js";
import { MAX_SUPPORTED_DEPTH } from "../value/model.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(file: string): Promise<string>;
  writeFile(file: string, text: string): Promise<void>;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
  stderr: (text) => process.stderr.write(text.endsWith("\n") ? text : `${text}\n`),
  readFile: (file) => fs.readFile(path.resolve(file), "utf8"),
  writeFile: async (file, text) => {
    await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await fs.writeFile(path.resolve(file), text, "utf8");
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

interface PolicyOptions {
  policy?: string;
  preset?: string;
  optional?: string[];
  maxDepth?: number;
  verbose?: boolean;
}

function parseDepth(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("must be a positive integer");
  if (n > MAX_SUPPORTED_DEPTH) throw new InvalidArgumentError(`must not exceed ${MAX_SUPPORTED_DEPTH}`);
  return n;
}

function withPolicyOptions(cmd: Command): Command {
  return cmd
    .option("--policy <file>", "policy file (JSON: preset, optionalFields, maxDepth)")
    .addOption(new Option("--preset <name>", "built-in optional-field preset").choices(Object.keys(POLICY_PRESETS)))
    .option("--optional <fields>", "comma-separated optional/default-valued field names", splitList)
    .option("--max-depth <n>", "maximum nesting depth", parseDepth)
    .option("-v, --verbose", "debug logging");
}

async function policyFor(
  opts: PolicyOptions,
  config: AppConfig
): Promise<{ policy: NormalizationPolicy; maxDepth: number }> {
  if (opts.verbose) setLogLevel("debug");
  const base = await resolvePolicy({ ...config, policyFile: opts.policy ?? config.policyFile });
  const parts = [base.policy];
  if (isPolicyPresetName(opts.preset)) parts.push(POLICY_PRESETS[opts.preset]);
  if (opts.optional?.length) parts.push(createPolicy(opts.optional));
  return { policy: mergePolicies(...parts), maxDepth: opts.maxDepth ?? base.maxDepth };
}

export function buildProgram(io: CliIO, config: AppConfig): Command {
  const program = new Command();

  // failures inside an action: report, exit 2, never throw past commander
  const guarded =
    <A extends unknown[]>(name: string, fn: (...args: A) => Promise<void>) =>
    async (...args: A) => {
      try {
        await fn(...args);
      } catch (e) {
        logger.debug(`[${name}] failed`, { error: serializeError(e) });
        io.stderr(`[${name}] ${e instanceof Error ? e.message : String(e)}`);
        io.setExitCode(2);
      }
    };

  program
    .name("semjson")
    .description("Semantic JSON equality and canonical encoding")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout(s),
      writeErr: (s) => io.stderr(s),
    });

  withPolicyOptions(
    program
      .command("equal")
      .description("compare two JSON files semantically; exit 0 if equal, 1 if different")
      .argument("<a>", "first JSON file")
      .argument("<b>", "second JSON file")
  ).action(
    guarded("equal", async (a: string, b: string, opts: PolicyOptions) => {
      const { policy, maxDepth } = await policyFor(opts, config);
      const [textA, textB] = await Promise.all([io.readFile(a), io.readFile(b)]);

      const result = compareDocuments(textA, textB, policy, { maxDepth });
      if (result.errors.a) io.stderr(`[equal] ${a}: ${result.errors.a.message}`);
      if (result.errors.b) io.stderr(`[equal] ${b}: ${result.errors.b.message}`);

      io.stdout(result.equal ? "equal" : "different");
      io.setExitCode(result.equal ? 0 : 1);
    })
  );

  program
    .command("canonicalize")
    .description("re-encode a JSON file in canonical form")
    .argument("<file>", "input JSON file")
    .option("-o, --out <file>", "write to a file instead of stdout")
    .option("--max-depth <n>", "maximum nesting depth", parseDepth)
    .action(
      guarded("canonicalize", async (file: string, opts: { out?: string; maxDepth?: number }) => {
        const text = await io.readFile(file);
        const result = canonicalize(text, { maxDepth: opts.maxDepth ?? config.maxDepth });
        if (!result.ok) {
          io.stderr(`[canonicalize] ${file}: ${result.error.code}: ${result.error.message}`);
          io.setExitCode(2);
          return;
        }
        if (opts.out) {
          await io.writeFile(opts.out, result.value);
          io.stderr(`[canonicalize] ${file} -> ${opts.out}`);
        } else {
          io.stdout(result.value);
        }
        io.setExitCode(0);
      })
    );

  withPolicyOptions(
    program
      .command("plan")
      .description("value to plan for a JSON attribute given state and config")
      .requiredOption("--state <file>", "JSON currently in state")
      .requiredOption("--config <file>", "JSON from configuration")
  ).action(
    guarded("plan", async (opts: PolicyOptions & { state: string; config: string }) => {
      const { policy, maxDepth } = await policyFor(opts, config);
      const [state, configured] = await Promise.all([io.readFile(opts.state), io.readFile(opts.config)]);

      const out = planJsonAttribute({ state, config: configured, plan: configured }, policy, { maxDepth });
      io.stdout(JSON.stringify({ plan: out.plan, suppressed: out.suppressed }, null, 2));
      // identical text is not a change either
      io.setExitCode(out.suppressed || state === configured ? 0 : 1);
    })
  );

  return program;
}
