import { z } from "zod";

const Separator = z.string().min(1, "separator must not be empty");

export const ReportConfigYaml = z
  .object({
    input_file: z.string().min(1).optional(),
    output_file: z.string().min(1).optional(),
    separator: Separator.optional()
  })
  .strict();

export type ReportConfigYaml = z.infer<typeof ReportConfigYaml>;

export const ReportConfig = z.object({
  input_file: z.string().min(1),
  output_file: z.string().min(1),
  separator: Separator
});

export type ReportConfig = z.infer<typeof ReportConfig>;
