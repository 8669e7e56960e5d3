#!/usr/bin/env node
/**
 * src/cli/semjson.ts
 *
 * Usage:
 *   semjson equal state.json config.json --preset workflow-node
 *   semjson canonicalize nodes.json --out nodes.canonical.json
 *   semjson plan --state state.json --config config.json --optional executeOnce,disabled
 */

import "dotenv/config";
import { CommanderError } from "commander";
import { loadConfig } from "../config/index.js";
import { logger, serializeError, setLogLevel } from "../server/logger.js";
import { buildProgram, processIO } from "./program.js";

const config = loadConfig();
setLogLevel(config.logLevel);

buildProgram(processIO, config)
  .parseAsync(process.argv)
  .catch((e) => {
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    logger.error("semjson failed", { error: serializeError(e) });
    process.exitCode = 2;
  });
