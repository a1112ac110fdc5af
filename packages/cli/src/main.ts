#!/usr/bin/env node
/**
 * @tally/cli: entry point.
 *
 * Runs the program against process argv/env. The exit code is set
 * rather than forced so pending log writes drain first.
 */

import { runCli } from "./cli.js";

process.exitCode = await runCli(process.argv, {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
  env: process.env,
});
