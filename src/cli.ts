#!/usr/bin/env node
import { CommanderError } from "commander";
import process from "node:process";
import { buildProgram } from "./cli/program.js";
import { runReport } from "./cli/run_report.js";

const program = buildProgram(async (opts) => {
  process.exitCode = await runReport(opts, {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env
  });
});

try {
  await program.parseAsync(process.argv);
} catch (e) {
  if (!(e instanceof CommanderError)) throw e;
  process.exitCode = e.exitCode;
}
