import type { ReportConfig } from "../schemas/config.js";
import { readTextFile, writeFileAtomic } from "../store/fs.js";
import { buildHierarchy } from "./hierarchy.js";
import { parseHierarchyRecords, parseSalaryRecords } from "./records.js";
import { renderHierarchyText, renderSummaryFile, renderSummaryText } from "./render.js";
import { summarizeSalaries } from "./summary.js";

export const REPORT_MODES = ["hierarchy", "summary", "save"] as const;

export type ReportMode = (typeof REPORT_MODES)[number];

export type GenerateReportArgs = {
  config: ReportConfig;
  mode: ReportMode;
  out: NodeJS.WritableStream;
};

export type GenerateReportResult =
  | { mode: "hierarchy"; departments: number }
  | { mode: "summary"; departments: number }
  | { mode: "save"; departments: number; output_file: string };

export async function generateReport(args: GenerateReportArgs): Promise<GenerateReportResult> {
  const { config, mode, out } = args;
  const text = await readTextFile(config.input_file);

  switch (mode) {
    case "hierarchy": {
      const hierarchy = buildHierarchy(parseHierarchyRecords(text, config.separator));
      out.write(renderHierarchyText(hierarchy));
      return { mode, departments: hierarchy.size };
    }
    case "summary": {
      const report = summarizeSalaries(parseSalaryRecords(text, config.separator));
      out.write(renderSummaryText(report));
      return { mode, departments: report.length };
    }
    case "save": {
      const report = summarizeSalaries(parseSalaryRecords(text, config.separator));
      const contents = renderSummaryFile(report, config.separator);
      await writeFileAtomic(config.output_file, contents);
      out.write(`Saved summary of ${report.length} department(s) to ${config.output_file}\n`);
      return { mode, departments: report.length, output_file: config.output_file };
    }
  }
}
