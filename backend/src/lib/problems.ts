import { getAllSchemes } from "../config/schemes";
import type { Problem, ProblemInput } from "../types/database";
import type { Database } from "./db";

export const MAX_LISTED_PROBLEMS = 1000;

export interface DeleteResult {
  deleted: boolean;
  /** Bindings dropped per scheme key, for the schemes that cascade */
  removedBindings: Record<string, number>;
}

export async function createProblem(
  db: Database,
  input: ProblemInput
): Promise<Problem | null> {
  return db.problems.insert(input);
}

export async function getProblem(
  db: Database,
  id: string
): Promise<Problem | null> {
  return db.problems.findById(id);
}

export async function replaceProblem(
  db: Database,
  id: string,
  input: ProblemInput
): Promise<Problem | null> {
  return db.problems.replace(id, input);
}

/**
 * Deletes a problem, then the bindings of every scheme that cascades.
 * Bindings of the other schemes are left pointing at the missing problem.
 */
export async function deleteProblem(
  db: Database,
  id: string
): Promise<DeleteResult> {
  const deleted = await db.problems.remove(id);
  const removedBindings: Record<string, number> = {};

  if (!deleted) {
    return { deleted, removedBindings };
  }

  for (const scheme of getAllSchemes()) {
    if (scheme.cascadeOnProblemDelete) {
      removedBindings[scheme.key] = await db
        .tagging(scheme)
        .bindings.removeForProblem(id);
    }
  }

  return { deleted, removedBindings };
}

export async function listProblems(db: Database): Promise<Problem[]> {
  return db.problems.list(MAX_LISTED_PROBLEMS);
}
