import { FormatError } from "../core/errors.js";

export type HierarchyRecord = {
  department: string;
  team: string;
};

export type SalaryRecord = {
  department: string;
  salary: number;
};

export type DataLine = {
  line_number: number;
  text: string;
};

const DEPARTMENT_FIELD = 1;
const TEAM_FIELD = 2;
const MIN_FIELDS = 3;

/** `\r\n`, `\n` or a lone `\r`. */
export const LINE_BREAK_RE = /\r\n|\r|\n/;

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;

export function splitFields(line: string, separator: string): string[] {
  return line.split(separator);
}

/** Data rows of a delimited file; the first line is always the header and is skipped. */
export function dataLines(text: string): DataLine[] {
  const lines = text.split(LINE_BREAK_RE);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  const out: DataLine[] = [];
  for (let i = 1; i < lines.length; i++) {
    out.push({ line_number: i + 1, text: lines[i] ?? "" });
  }
  return out;
}

export function parseInteger(raw: string): number | null {
  if (!INTEGER_RE.test(raw)) return null;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) ? n : null;
}

function requireFields(line: string, separator: string, lineNumber: number): string[] {
  const fields = splitFields(line, separator);
  if (fields.length < MIN_FIELDS) {
    throw new FormatError(
      `Line ${lineNumber}: expected at least ${MIN_FIELDS} fields separated by "${separator}", got ${fields.length}`
    );
  }
  return fields;
}

export function parseHierarchyRecord(line: string, separator: string, lineNumber: number): HierarchyRecord {
  const fields = requireFields(line, separator, lineNumber);
  return {
    department: fields[DEPARTMENT_FIELD] ?? "",
    team: fields[TEAM_FIELD] ?? ""
  };
}

export function parseSalaryRecord(line: string, separator: string, lineNumber: number): SalaryRecord {
  const fields = requireFields(line, separator, lineNumber);
  const raw = fields[fields.length - 1] ?? "";
  const salary = parseInteger(raw);
  if (salary === null) {
    throw new FormatError(`Line ${lineNumber}: salary is not an integer: ${JSON.stringify(raw)}`);
  }
  return { department: fields[DEPARTMENT_FIELD] ?? "", salary };
}

export function parseHierarchyRecords(text: string, separator: string): HierarchyRecord[] {
  return dataLines(text).map((l) => parseHierarchyRecord(l.text, separator, l.line_number));
}

export function parseSalaryRecords(text: string, separator: string): SalaryRecord[] {
  return dataLines(text).map((l) => parseSalaryRecord(l.text, separator, l.line_number));
}
