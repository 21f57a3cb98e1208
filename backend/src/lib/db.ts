/**
 * Database access contracts
 * Route handlers only see these interfaces; the Mongo implementation lives in
 * ./mongo and tests pass an in-memory one.
 */

import mongoose from "mongoose";
import type { TagScheme } from "../config/schemes";
import type { Binding, Problem, ProblemInput, Tag } from "../types/database";

export interface ProblemStore {
  /** Returns the stored document, or null if the store reports nothing back */
  insert(input: ProblemInput): Promise<Problem | null>;
  findById(id: string): Promise<Problem | null>;
  /** Overwrites every field but the id; null when no such problem exists */
  replace(id: string, input: ProblemInput): Promise<Problem | null>;
  remove(id: string): Promise<boolean>;
  list(limit: number): Promise<Problem[]>;
}

export interface TagStore {
  findByValue(value: string): Promise<Tag | null>;
  /** Atomic find-or-insert */
  findOrCreate(value: string): Promise<Tag>;
  list(): Promise<Tag[]>;
}

export interface BindingStore {
  /**
   * Inserts a binding. With `unique`, an existing (tag, problem) pair is left
   * alone and false is returned.
   */
  link(
    tagId: string,
    problemId: string,
    options: { unique: boolean }
  ): Promise<boolean>;
  problemIdsForTag(tagId: string): Promise<string[]>;
  removeForProblem(problemId: string): Promise<number>;
  list(): Promise<Binding[]>;
}

export interface TaggingStores {
  tags: TagStore;
  bindings: BindingStore;
}

export interface Database {
  problems: ProblemStore;
  tagging(scheme: TagScheme): TaggingStores;
}

/**
 * True for a 24-char hex ObjectId string
 */
export function isObjectId(value: string): boolean {
  return mongoose.isObjectIdOrHexString(value);
}
