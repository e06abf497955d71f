#!/usr/bin/env node
import pino from "pino";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { connect } from "./negotiate.js";
import { probe } from "./probe.js";
import { runCli } from "./program.js";

// stdout carries the command's output; logs go to stderr
const logger = createLogger(pino.destination(2));

process.exitCode = await runCli(process.argv.slice(2), {
  loadConfig,
  negotiate: connect,
  probe,
  logger,
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
});
