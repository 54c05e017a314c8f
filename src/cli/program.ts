import { Command, InvalidArgumentError } from "commander";

export type CliOptions = {
  inputFile?: string;
  outputFile?: string;
  separator?: string;
  mode?: string;
  config?: string;
};

export type ProgramOutput = {
  writeOut: (s: string) => void;
  writeErr: (s: string) => void;
};

function once(flag: string) {
  return (value: string, previous: string | undefined): string => {
    if (previous !== undefined) throw new InvalidArgumentError(`${flag} was given more than once.`);
    return value;
  };
}

/**
 * Builds the `dept-report` command. Parsing errors surface as a thrown `CommanderError` (see `exitOverride`)
 * instead of exiting the process.
 */
export function buildProgram(run: (opts: CliOptions) => Promise<void>, output?: ProgramOutput): Command {
  const program = new Command();

  program
    .name("dept-report")
    .description("Department hierarchy and salary summary reports from a delimited employee file")
    .version("0.1.0")
    .option("-if, --input-file <path>", "Input .csv file (default: test.csv)", once("--input-file"))
    .option("-of, --output-file <path>", "Output file for the saved summary (default: result.csv)", once("--output-file"))
    .option("-s, --separator <sep>", "Field separator for input and output (default: ;)", once("--separator"))
    .option("-m, --mode <option>", "Menu option to run without prompting: 1, 2 or 3", once("--mode"))
    .option("-c, --config <file>", "YAML file with input_file, output_file and separator", once("--config"))
    .allowExcessArguments()
    .exitOverride()
    .action(async (opts: CliOptions) => {
      await run(opts);
    });

  if (output) program.configureOutput(output);
  return program;
}
