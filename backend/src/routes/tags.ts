/**
 * Tagging routes. One router per scheme, registered on absolute paths taken
 * from the scheme config.
 */

import { Hono } from "hono";
import { validator } from "hono/validator";
import type { TagScheme } from "../config/schemes";
import { MESSAGES } from "../lib/messages";
import {
  assignTag,
  findProblemsByTag,
  listBindings,
  listTagValues,
  listTagsWithIds,
} from "../lib/tagging";
import { parseWith } from "../middleware/validate";
import { assignmentSchema, tagQuerySchema } from "../schemas/problem";
import type { AppEnv } from "../types/env";

export function createTagRouter(scheme: TagScheme) {
  const router = new Hono<AppEnv>();

  /**
   * POST /api/assign_type, /api/give_a_name
   * Body: { <valueField>, problem_id }
   */
  router.post(
    scheme.routes.assign,
    validator("json", parseWith(assignmentSchema(scheme.valueField))),
    async (c) => {
      const { value, problemId } = c.req.valid("json");
      const result = await assignTag(c.env.DB, scheme, value, problemId);

      if (result.status === "problem-not-found") {
        return c.json({ error: MESSAGES.problemNotFound }, 404);
      }

      if (result.status === "already-assigned") {
        return c.json(scheme.messages.alreadyAssigned(problemId, value));
      }

      console.log("Tag assigned:", {
        scheme: scheme.key,
        value,
        tagId: result.tagId,
        problemId,
      });

      return c.json(scheme.messages.assigned(problemId, value));
    }
  );

  /**
   * GET /api/get_problems_by_type?problem_type=, /api/get_problems_by_name?problem_name=
   */
  router.get(
    scheme.routes.query,
    validator("query", parseWith(tagQuerySchema(scheme.routes.queryParam))),
    async (c) => {
      const value = c.req.valid("query");
      const result = await findProblemsByTag(c.env.DB, scheme, value);

      if (result.status === "tag-not-found") {
        return c.json({ error: scheme.messages.tagNotFound }, 404);
      }

      return c.json(result.problems);
    }
  );

  /**
   * GET /api/types, /api/names
   */
  router.get(scheme.routes.list, async (c) => {
    const values = await listTagValues(c.env.DB, scheme);
    return c.json(values);
  });

  // Debug-only listings, not part of the documented API
  router.get(scheme.routes.debugBindings, async (c) => {
    const bindings = await listBindings(c.env.DB, scheme);
    return c.json(bindings);
  });

  router.get(scheme.routes.debugTags, async (c) => {
    const tags = await listTagsWithIds(c.env.DB, scheme);
    return c.json(tags);
  });

  return router;
}
