import { ConfigurationError } from "../core/errors.js";
import { LINE_BREAK_RE, parseInteger, splitFields } from "../report/records.js";
import type { ReportConfig } from "../schemas/config.js";
import { filesHaveSameContent, pathExists, readTextFile } from "../store/fs.js";

export const EXPECTED_INPUT_FIELDS = 6;

export function fileExtension(filePath: string): string {
  const parts = filePath.split(".");
  return parts[parts.length - 1] ?? "";
}

/**
 * Checks the files before any report is built: the input must be an existing `.csv` file whose first data
 * row has exactly six fields ending in an integer salary, and the output must not be a copy of the input.
 */
export async function validateInputFiles(config: ReportConfig): Promise<void> {
  const { input_file: inputFile, output_file: outputFile, separator } = config;

  if (!(await pathExists(inputFile))) {
    throw new ConfigurationError(`Input file does not exist: ${inputFile}`);
  }
  if (fileExtension(inputFile) !== "csv") {
    throw new ConfigurationError(`Input file is not a .csv file: ${inputFile}`);
  }
  if ((await pathExists(outputFile)) && (await filesHaveSameContent(inputFile, outputFile))) {
    throw new ConfigurationError("Input and output files are the same");
  }

  const text = await readTextFile(inputFile);
  const firstDataRow = text.split(LINE_BREAK_RE)[1] ?? "";
  const fields = splitFields(firstDataRow, separator);
  const salary = fields[EXPECTED_INPUT_FIELDS - 1];
  if (fields.length !== EXPECTED_INPUT_FIELDS || salary === undefined || parseInteger(salary) === null) {
    throw new ConfigurationError(`Input file has wrong format: ${inputFile}`);
  }
}
