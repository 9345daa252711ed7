import { z } from "zod";

export function formatValidationError(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) {
    return "schema validation failed";
  }
  const where = first.path.length > 0 ? first.path.join(".") : "(root)";
  return `${where}: ${first.message}`;
}
