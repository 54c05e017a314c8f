import readline from "node:readline";
import { ConfigurationError } from "../core/errors.js";
import type { ReportMode } from "../report/generate.js";

const MENU_OPTIONS: Record<string, ReportMode> = {
  "1": "hierarchy",
  "2": "summary",
  "3": "save"
};

export function menuText(): string {
  return [
    "Choose a report:",
    "1. Department hierarchy: every department and the teams in it.",
    "2. Department summary: name, headcount, salary range, average salary.",
    "3. Save the department summary from option 2 as a .csv file.",
    ""
  ].join("\n");
}

export function parseMenuOption(answer: string): ReportMode {
  const mode = Object.hasOwn(MENU_OPTIONS, answer) ? MENU_OPTIONS[answer] : undefined;
  if (!mode) throw new ConfigurationError(`Invalid menu option: ${JSON.stringify(answer)}. Valid: 1, 2, 3`);
  return mode;
}

function question(rl: readline.Interface, prompt: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(prompt, (answer) => {
      rl.off("close", onClose);
      resolve(answer);
    });
  });
}

export async function promptMenuOption(args: {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}): Promise<ReportMode> {
  args.output.write(menuText());
  const rl = readline.createInterface({ input: args.input, output: args.output, terminal: false });
  try {
    const answer = await question(rl, "Enter one number: ");
    if (answer === null) throw new ConfigurationError("No menu option entered");
    return parseMenuOption(answer);
  } finally {
    rl.close();
  }
}
