import { z } from "zod";
import { isObjectId } from "../lib/db";
import { MESSAGES } from "../lib/messages";

// Free-form step maps; null is accepted and stored as {}
const freeFormMap = z
  .record(z.string(), z.unknown())
  .nullish()
  .transform((value) => value ?? {});

export const StepSchema = z.object({
  order: z.number().int(),
  prerequisites: freeFormMap,
  transition: freeFormMap,
  outcomes: freeFormMap,
});

export const SolutionSchema = z.object({
  steps: z.array(StepSchema).default([]),
});

export const GeoAnswerKeySchema = z.object({
  hash: z.string(),
  seed: z.number().int(),
});

/**
 * Request body for creating or replacing a problem.
 * Any `_id`/`id` sent by the client is stripped here: the server owns identity.
 */
export const ProblemInputSchema = z.object({
  statement: z.string(),
  title: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  geo_answer_key: GeoAnswerKeySchema,
  result: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  solution: SolutionSchema.default({ steps: [] }),
  llm_solution: z
    .unknown()
    .optional()
    .transform((value) => value ?? null),
});

export const ObjectIdSchema = z
  .string()
  .refine(isObjectId, { message: MESSAGES.invalidId });

export interface Assignment {
  value: string;
  problemId: string;
}

const AssignmentTargetSchema = z.object({ problem_id: ObjectIdSchema });

/**
 * Body of an assign request, keyed by the scheme's value field
 * (`name` or `type_name`). Empty values are allowed.
 */
export function assignmentSchema(valueField: string) {
  return AssignmentTargetSchema.and(z.object({ [valueField]: z.string() })).transform(
    (body): Assignment => ({
      value: String(body[valueField]),
      problemId: body.problem_id,
    })
  );
}

export function tagQuerySchema(param: string) {
  return z
    .object({ [param]: z.string() })
    .transform((query): string => String(query[param]));
}

export type Step = z.infer<typeof StepSchema>;
export type GeoAnswerKey = z.infer<typeof GeoAnswerKeySchema>;
export type ProblemInput = z.infer<typeof ProblemInputSchema>;
