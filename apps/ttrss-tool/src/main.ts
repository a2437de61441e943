#!/usr/bin/env tsx
import { runCli } from "./cli";
import { EX_SOFTWARE } from "./exit_codes";

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  stdin: process.stdin,
  env: process.env,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`ttrss-tool: ${String(error)}\n`);
    process.exitCode = EX_SOFTWARE;
  },
);
