import { z } from "zod";
import { CliError } from "../errors.js";
import { formatValidationError } from "../utils/validation.js";

export const RunOptionsSchema = z.object({
  repo: z.string().trim().min(1).default("scylla"),
  owner: z.string().trim().min(1).default("scylladb"),
  token: z.string().min(1),
  period: z.number().int().positive().optional(),
  openOnly: z.boolean().default(false),
  attentionDays: z.number().int().nonnegative().default(15),
  apiUrl: z.string().url().default("https://api.github.com"),
  verbose: z.boolean().default(false),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

export function parseRunOptions(input: unknown): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new CliError(`Invalid options: ${formatValidationError(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}
