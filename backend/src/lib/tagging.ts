/**
 * Tagging operations shared by the "name" and "type" schemes.
 * Per-scheme behaviour comes from the TagScheme policy flags.
 */

import type { TagScheme } from "../config/schemes";
import type { Problem } from "../types/database";
import type { Database } from "./db";

export type AssignResult =
  | { status: "assigned"; tagId: string }
  | { status: "already-assigned"; tagId: string }
  | { status: "problem-not-found" };

export type QueryResult =
  | { status: "found"; problems: Problem[] }
  | { status: "tag-not-found" };

/**
 * Binds a tag value to a problem, creating the tag on first use
 */
export async function assignTag(
  db: Database,
  scheme: TagScheme,
  value: string,
  problemId: string
): Promise<AssignResult> {
  const problem = await db.problems.findById(problemId);
  if (!problem) {
    return { status: "problem-not-found" };
  }

  const { tags, bindings } = db.tagging(scheme);
  const tag = await tags.findOrCreate(value);
  const created = await bindings.link(tag.id, problemId, {
    unique: scheme.uniqueBindings,
  });

  return created
    ? { status: "assigned", tagId: tag.id }
    : { status: "already-assigned", tagId: tag.id };
}

/**
 * Resolves all problems bound to a tag value, in binding order.
 * Bindings whose problem no longer exists are skipped.
 */
export async function findProblemsByTag(
  db: Database,
  scheme: TagScheme,
  value: string
): Promise<QueryResult> {
  const { tags, bindings } = db.tagging(scheme);
  const tag = await tags.findByValue(value);

  if (!tag) {
    return scheme.missingTag === "empty"
      ? { status: "found", problems: [] }
      : { status: "tag-not-found" };
  }

  const problemIds = await bindings.problemIdsForTag(tag.id);
  const problems: Problem[] = [];

  for (const problemId of problemIds) {
    const problem = await db.problems.findById(problemId);
    if (problem) {
      problems.push(problem);
    } else {
      console.warn("Skipping binding to a missing problem:", {
        scheme: scheme.key,
        tag: value,
        tagId: tag.id,
        problemId,
      });
    }
  }

  return { status: "found", problems };
}

export async function listTagValues(
  db: Database,
  scheme: TagScheme
): Promise<string[]> {
  const tags = await db.tagging(scheme).tags.list();
  return tags.map((tag) => tag.value);
}

/**
 * Debug listing of bindings, keyed the way they are stored
 */
export async function listBindings(
  db: Database,
  scheme: TagScheme
): Promise<Array<Record<string, string>>> {
  const bindings = await db.tagging(scheme).bindings.list();
  return bindings.map((binding) => ({
    [scheme.idField]: binding.tagId,
    problem_id: binding.problemId,
  }));
}

/**
 * Debug listing of tags with their ids
 */
export async function listTagsWithIds(
  db: Database,
  scheme: TagScheme
): Promise<Array<Record<string, string>>> {
  const tags = await db.tagging(scheme).tags.list();
  return tags.map((tag) => ({
    _id: tag.id,
    [scheme.valueField]: tag.value,
  }));
}
