/**
 * Problem resource routes, mounted at /api/problems
 */

import { Hono } from "hono";
import { validator } from "hono/validator";
import { isObjectId } from "../lib/db";
import { MESSAGES } from "../lib/messages";
import {
  createProblem,
  deleteProblem,
  getProblem,
  listProblems,
  replaceProblem,
} from "../lib/problems";
import { parseWith } from "../middleware/validate";
import { ProblemInputSchema } from "../schemas/problem";
import type { AppEnv } from "../types/env";

const problems = new Hono<AppEnv>();

/**
 * POST /api/problems
 * Store a new problem; the server generates its id
 */
problems.post("/", validator("json", parseWith(ProblemInputSchema)), async (c) => {
  const problem = await createProblem(c.env.DB, c.req.valid("json"));

  if (!problem) {
    return c.json({ error: MESSAGES.problemCreateFailed }, 500);
  }

  return c.json(problem, 201);
});

/**
 * GET /api/problems
 * All problems, capped at MAX_LISTED_PROBLEMS
 */
problems.get("/", async (c) => {
  const result = await listProblems(c.env.DB);
  return c.json(result);
});

/**
 * GET /api/problems/:id
 */
problems.get("/:id", async (c) => {
  const id = c.req.param("id");

  if (!isObjectId(id)) {
    return c.json({ error: MESSAGES.invalidId }, 400);
  }

  const problem = await getProblem(c.env.DB, id);

  if (!problem) {
    return c.json({ error: MESSAGES.problemNotFound }, 404);
  }

  return c.json(problem);
});

/**
 * PUT /api/problems/:id
 * Replace every field but the id. Never creates a missing problem.
 */
problems.put("/:id", validator("json", parseWith(ProblemInputSchema)), async (c) => {
  const id = c.req.param("id");

  if (!isObjectId(id)) {
    return c.json({ error: MESSAGES.invalidId }, 400);
  }

  const problem = await replaceProblem(c.env.DB, id, c.req.valid("json"));

  if (!problem) {
    return c.json({ error: MESSAGES.problemNotFound }, 404);
  }

  return c.json(problem);
});

/**
 * DELETE /api/problems/:id
 * Also drops the problem's bindings in schemes that cascade
 */
problems.delete("/:id", async (c) => {
  const id = c.req.param("id");

  if (!isObjectId(id)) {
    return c.json({ error: MESSAGES.invalidId }, 400);
  }

  const result = await deleteProblem(c.env.DB, id);

  if (!result.deleted) {
    return c.json({ error: MESSAGES.problemNotFound }, 404);
  }

  console.log("Problem deleted:", { id, removedBindings: result.removedBindings });

  return c.json(MESSAGES.problemDeleted(id));
});

export default problems;
