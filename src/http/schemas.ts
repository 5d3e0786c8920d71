import { z } from "zod";
import { parseUtcTimestamp } from "./timestamps.js";

const sessionIdSchema = z
  .string()
  .refine((value) => value.trim().length > 0, "session_id must be a non-empty string");

const countSchema = (field: string) =>
  z
    .number({ required_error: `${field} is required`, invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .min(0, `${field} must be >= 0`)
    .max(Number.MAX_SAFE_INTEGER, `${field} is too large`);

export const sessionCreateBodySchema = z.object({
  user_id: z.string().trim().nullish(),
  session_id: z.string().nullish(),
});

export const typingSampleSchema = z.object({
  session_id: sessionIdSchema,
  timestamp: z.string().transform((value, ctx) => {
    const parsed = parseUtcTimestamp(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "timestamp must be an ISO-8601 date-time" });
      return z.NEVER;
    }
    return parsed;
  }),
  chars_typed: countSchema("chars_typed"),
  duration_ms: countSchema("duration_ms"),
});

export function buildSubmissionBodySchema(maxBatchSize: number) {
  return z.object({
    session_id: sessionIdSchema,
    samples: z
      .array(typingSampleSchema)
      .min(1, "samples must be a non-empty list")
      .max(maxBatchSize, `samples must contain at most ${maxBatchSize} entries`),
  });
}

export type SessionCreateBody = z.infer<typeof sessionCreateBodySchema>;
export type TypingSampleBody = z.infer<typeof typingSampleSchema>;
export type SubmissionBody = z.infer<ReturnType<typeof buildSubmissionBodySchema>>;

export function formatZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid request body";
  const location = issue.path.join(".");
  return location ? `${location}: ${issue.message}` : issue.message;
}
