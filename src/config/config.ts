import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import { ReportConfig, ReportConfigYaml } from "../schemas/config.js";
import { readYamlFile } from "../store/yaml.js";

export const DEFAULT_REPORT_CONFIG: ReportConfig = Object.freeze({
  input_file: "test.csv",
  output_file: "result.csv",
  separator: ";"
});

export type ReportConfigFlags = {
  input_file?: string;
  output_file?: string;
  separator?: string;
};

function zodIssuesToMessage(filePath: string, err: z.ZodError): string {
  return err.issues
    .map((i) => `${filePath}: ${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("\n");
}

export async function readReportConfigFile(filePath: string): Promise<ReportConfigYaml> {
  let doc: unknown;
  try {
    doc = await readYamlFile(filePath);
  } catch (e) {
    const err = e instanceof Error ? e : new Error(String(e));
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${err.message}`);
  }
  // An empty document has no contents.
  const parsed = ReportConfigYaml.safeParse(doc ?? {});
  if (!parsed.success) throw new ConfigurationError(zodIssuesToMessage(filePath, parsed.error));
  return parsed.data;
}

/** Flag > config file > built-in default. */
export async function resolveReportConfig(args: {
  flags?: ReportConfigFlags;
  config_file?: string;
}): Promise<ReportConfig> {
  const fromFile: ReportConfigYaml = args.config_file ? await readReportConfigFile(args.config_file) : {};
  const flags = args.flags ?? {};
  const merged = {
    input_file: flags.input_file ?? fromFile.input_file ?? DEFAULT_REPORT_CONFIG.input_file,
    output_file: flags.output_file ?? fromFile.output_file ?? DEFAULT_REPORT_CONFIG.output_file,
    separator: flags.separator ?? fromFile.separator ?? DEFAULT_REPORT_CONFIG.separator
  };
  const parsed = ReportConfig.safeParse(merged);
  if (!parsed.success) throw new ConfigurationError(zodIssuesToMessage("options", parsed.error));
  return parsed.data;
}
