#!/usr/bin/env node

import "dotenv/config";
import { runCli } from "./cli";
import { describeError } from "./lib/security";

runCli(process.argv.slice(2))
  .then((result) => {
    if (result && !result.success) {
      process.exitCode = 1;
    }
  })
  .catch((error) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
