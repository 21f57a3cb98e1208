/**
 * Database types matching the stored collections
 */

import type { ProblemInput } from "../schemas/problem";

export type { Step, GeoAnswerKey, ProblemInput } from "../schemas/problem";

/**
 * A stored problem. `_id` is the ObjectId as a 24-char hex string.
 */
export type Problem = ProblemInput & {
  _id: string;
};

export interface Tag {
  id: string;
  value: string;
}

export interface Binding {
  tagId: string;
  problemId: string;
}
