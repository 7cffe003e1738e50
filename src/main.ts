#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli.js";
import { describeError } from "./exec.js";
import { createTrialLogger } from "./logger.js";

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    createTrialLogger().error(describeError(err));
    process.exitCode = 1;
  },
);
