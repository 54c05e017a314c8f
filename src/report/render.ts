import { EmptyReportError, FormatError } from "../core/errors.js";
import type { Hierarchy } from "./hierarchy.js";
import { dataLines, LINE_BREAK_RE, splitFields } from "./records.js";
import type { DepartmentSummary, SummaryReport } from "./summary.js";

export const SUMMARY_LABELS = ["Name", "Headcount", "Salary range", "Average salary"] as const;

export type SummaryRow = {
  name: string;
  headcount: string;
  salary_range: string;
  average_salary: string;
};

export function formatSalaryRange(s: DepartmentSummary): string {
  return `${s.minSalary} - ${s.maxSalary}`;
}

/**
 * Shortest decimal that round-trips to the same double, with a trailing `.0` on integral values
 * (`2000.0`, `55000.333333333336`).
 */
export function formatAverageSalary(n: number): string {
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return n.toFixed(1);
  return String(n);
}

function summaryValues(s: DepartmentSummary): [string, string, string, string] {
  return [s.name, String(s.count), formatSalaryRange(s), formatAverageSalary(s.averageSalary)];
}

export function renderHierarchyText(hierarchy: Hierarchy): string {
  const lines: string[] = [];
  for (const [department, teams] of hierarchy) {
    lines.push(`Department: ${department}`);
    for (const team of teams) lines.push(`\tTeam: ${team}`);
  }
  return lines.map((l) => `${l}\n`).join("");
}

export function renderDepartmentText(s: DepartmentSummary): string {
  const values = summaryValues(s);
  const lines = SUMMARY_LABELS.map((label, i) => `${label}: ${values[i]}`);
  return `${lines.join("\n")}\n\n`;
}

export function renderSummaryText(report: SummaryReport): string {
  return report.map(renderDepartmentText).join("");
}

export function renderSummaryFile(report: SummaryReport, separator: string): string {
  if (report.length === 0) {
    throw new EmptyReportError("Summary report has no departments; nothing to save");
  }
  const lines = [SUMMARY_LABELS.join(separator), ...report.map((s) => summaryValues(s).join(separator))];
  return lines.map((l) => `${l}\n`).join("");
}

export function parseSummaryFile(text: string, separator: string): SummaryRow[] {
  const header = text.split(LINE_BREAK_RE, 1)[0] ?? "";
  const expected = SUMMARY_LABELS.join(separator);
  if (header !== expected) {
    throw new FormatError(`Unexpected summary header: ${JSON.stringify(header)} (expected ${JSON.stringify(expected)})`);
  }
  return dataLines(text).map((l) => {
    const fields = splitFields(l.text, separator);
    const [name, headcount, salaryRange, averageSalary] = fields;
    if (
      fields.length !== SUMMARY_LABELS.length ||
      name === undefined ||
      headcount === undefined ||
      salaryRange === undefined ||
      averageSalary === undefined
    ) {
      throw new FormatError(
        `Line ${l.line_number}: expected ${SUMMARY_LABELS.length} fields separated by "${separator}", got ${fields.length}`
      );
    }
    return { name, headcount, salary_range: salaryRange, average_salary: averageSalary };
  });
}
