import { resolveReportConfig } from "../config/config.js";
import { ConfigurationError, ReportError } from "../core/errors.js";
import { validateInputFiles } from "../input/validate.js";
import { generateReport } from "../report/generate.js";
import { parseMenuOption, promptMenuOption } from "./menu.js";
import type { CliOptions } from "./program.js";

export type ReportIo = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
};

function reportError(e: unknown, io: ReportIo): void {
  const err = e instanceof Error ? e : new Error(String(e));
  io.stderr.write(`ERROR: ${err.message}\n`);
  if (err instanceof ReportError) return;
  if (io.env?.REPORT_DEBUG === "1" && err.stack) {
    io.stderr.write(`${err.stack}\n`);
  }
}

/** Runs one report end to end and returns the process exit status. */
export async function runReport(opts: CliOptions, io: ReportIo): Promise<number> {
  try {
    const config = await resolveReportConfig({
      flags: {
        input_file: opts.inputFile,
        output_file: opts.outputFile,
        separator: opts.separator
      },
      config_file: opts.config
    });
    await validateInputFiles(config);
    const mode =
      opts.mode !== undefined
        ? parseMenuOption(opts.mode)
        : await promptMenuOption({ input: io.stdin, output: io.stdout });
    await generateReport({ config, mode, out: io.stdout });
    return 0;
  } catch (e) {
    reportError(e, io);
    return e instanceof ConfigurationError ? 2 : 1;
  }
}
