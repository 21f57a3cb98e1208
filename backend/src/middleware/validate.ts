/**
 * Request validation with zod schemas, plugged into hono's validator()
 */

import type { Context } from "hono";
import type { z } from "zod";
import { MESSAGES } from "../lib/messages";

export interface IssueDetail {
  path: string;
  message: string;
}

export function formatIssues(error: z.ZodError): IssueDetail[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validator hook: parsed data on success, a 422 response otherwise
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T) {
  return (value: unknown, c: Context) => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      return c.json(
        {
          error: MESSAGES.validationFailed,
          details: formatIssues(parsed.error),
        },
        422
      );
    }
    const data: z.output<T> = parsed.data;
    return data;
  };
}
