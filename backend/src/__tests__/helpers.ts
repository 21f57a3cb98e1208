/**
 * Test Helper Functions
 * In-memory Database and request utilities for driving the app in process
 */

import mongoose from "mongoose";
import { createApp } from "../app";
import type { TagScheme } from "../config/schemes";
import type {
  BindingStore,
  Database,
  ProblemStore,
  TagStore,
  TaggingStores,
} from "../lib/db";
import type { Binding, Problem, ProblemInput, Tag } from "../types/database";

export const TEST_ORIGIN = "http://localhost:8080";

function newId(): string {
  return new mongoose.Types.ObjectId().toHexString();
}

// structuredClone keeps stored state independent of what callers mutate
function createMemoryProblemStore(rows: Problem[]): ProblemStore {
  return {
    async insert(input) {
      const problem: Problem = { ...structuredClone(input), _id: newId() };
      rows.push(problem);
      return structuredClone(problem);
    },

    async findById(id) {
      const found = rows.find((row) => row._id === id);
      return found ? structuredClone(found) : null;
    },

    async replace(id, input) {
      const index = rows.findIndex((row) => row._id === id);
      if (index === -1) {
        return null;
      }
      rows[index] = { ...structuredClone(input), _id: id };
      return structuredClone(rows[index]);
    },

    async remove(id) {
      const index = rows.findIndex((row) => row._id === id);
      if (index === -1) {
        return false;
      }
      rows.splice(index, 1);
      return true;
    },

    async list(limit) {
      return structuredClone(rows.slice(0, limit));
    },
  };
}

function createMemoryTagStore(rows: Tag[]): TagStore {
  return {
    async findByValue(value) {
      return rows.find((tag) => tag.value === value) ?? null;
    },

    async findOrCreate(value) {
      const existing = rows.find((tag) => tag.value === value);
      if (existing) {
        return existing;
      }
      const tag = { id: newId(), value };
      rows.push(tag);
      return tag;
    },

    async list() {
      return [...rows];
    },
  };
}

function createMemoryBindingStore(rows: Binding[]): BindingStore {
  return {
    async link(tagId, problemId, options) {
      const exists = rows.some(
        (row) => row.tagId === tagId && row.problemId === problemId
      );
      if (options.unique && exists) {
        return false;
      }
      rows.push({ tagId, problemId });
      return true;
    },

    async problemIdsForTag(tagId) {
      return rows.filter((row) => row.tagId === tagId).map((row) => row.problemId);
    },

    async removeForProblem(problemId) {
      const before = rows.length;
      const kept = rows.filter((row) => row.problemId !== problemId);
      rows.splice(0, rows.length, ...kept);
      return before - kept.length;
    },

    async list() {
      return [...rows];
    },
  };
}

export interface MemoryDatabase extends Database {
  problemRows: Problem[];
}

/**
 * Database kept in plain arrays, with the same observable behaviour as the
 * Mongo implementation for everything the API relies on
 */
export function createMemoryDatabase(): MemoryDatabase {
  const problemRows: Problem[] = [];
  const tagging = new Map<string, TaggingStores>();

  return {
    problemRows,
    problems: createMemoryProblemStore(problemRows),
    tagging(scheme: TagScheme) {
      let stores = tagging.get(scheme.key);
      if (!stores) {
        stores = {
          tags: createMemoryTagStore([]),
          bindings: createMemoryBindingStore([]),
        };
        tagging.set(scheme.key, stores);
      }
      return stores;
    },
  };
}

/**
 * App wired to an in-memory database
 */
export function createTestClient(db: Database = createMemoryDatabase()) {
  const app = createApp({ corsOrigins: [TEST_ORIGIN] });

  const request = (path: string, init: RequestInit = {}) =>
    app.request(path, init, { DB: db });

  const send = (method: string, path: string, body: unknown) =>
    request(path, {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  return {
    app,
    db,
    request,
    get: (path: string) => request(path),
    post: (path: string, body: unknown) => send("POST", path, body),
    put: (path: string, body: unknown) => send("PUT", path, body),
    delete: (path: string) => request(path, { method: "DELETE" }),
  };
}

/**
 * A minimal valid problem payload
 */
export function buildProblemInput(
  overrides: Partial<ProblemInput> = {}
): ProblemInput {
  return {
    statement: "2+2=?",
    title: null,
    geo_answer_key: { hash: "abc", seed: 1 },
    result: "",
    solution: { steps: [] },
    llm_solution: null,
    ...overrides,
  };
}

export async function createProblemViaApi(
  client: ReturnType<typeof createTestClient>,
  overrides: Partial<ProblemInput> = {}
): Promise<Problem> {
  const response = await client.post("/api/problems", buildProblemInput(overrides));
  if (response.status !== 201) {
    throw new Error(`Problem creation failed with ${response.status}`);
  }
  const db = client.db;
  const body: unknown = await response.json();
  const id =
    typeof body === "object" && body !== null && "_id" in body
      ? String(body._id)
      : "";
  const stored = await db.problems.findById(id);
  if (!stored) {
    throw new Error(`Created problem ${id} is not in the store`);
  }
  return stored;
}
