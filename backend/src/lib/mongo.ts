/**
 * MongoDB implementation of the database contracts, on a single Mongoose
 * connection shared by every request
 */

import mongoose, { Schema, Types, type Connection, type Model } from "mongoose";
import type { TagScheme } from "../config/schemes";
import type { Binding, Problem, ProblemInput, Step, Tag } from "../types/database";
import type {
  BindingStore,
  Database,
  ProblemStore,
  TagStore,
  TaggingStores,
} from "./db";

export const PROBLEMS_COLLECTION = "problems_collection";

type LeanProblem = Partial<ProblemInput> &
  Pick<ProblemInput, "statement" | "geo_answer_key"> & {
    _id: Types.ObjectId;
  };

type LeanRecord = { _id: Types.ObjectId } & Record<string, unknown>;

const freeForm = { type: Schema.Types.Mixed, default: () => ({}) };

const stepSchema = new Schema<Step>(
  {
    order: { type: Number, required: true },
    prerequisites: freeForm,
    transition: freeForm,
    outcomes: freeForm,
  },
  { _id: false, minimize: false }
);

// No `required` on string paths: it rejects "", which a valid request may carry.
// minimize: false keeps empty step maps in the stored document.
const problemSchema = new Schema<ProblemInput>(
  {
    statement: { type: String },
    title: { type: String, default: null },
    geo_answer_key: {
      hash: { type: String },
      seed: { type: Number, required: true },
    },
    result: { type: String, default: "" },
    solution: {
      steps: { type: [stepSchema], default: [] },
    },
    llm_solution: { type: Schema.Types.Mixed, default: null },
  },
  { versionKey: false, minimize: false }
);

function toStep(step: Partial<Step>): Step {
  return {
    order: step.order ?? 0,
    prerequisites: step.prerequisites ?? {},
    transition: step.transition ?? {},
    outcomes: step.outcomes ?? {},
  };
}

function toProblem(doc: LeanProblem): Problem {
  return {
    _id: doc._id.toHexString(),
    statement: doc.statement,
    title: doc.title ?? null,
    geo_answer_key: {
      hash: doc.geo_answer_key.hash,
      seed: doc.geo_answer_key.seed,
    },
    result: doc.result ?? "",
    solution: { steps: (doc.solution?.steps ?? []).map(toStep) },
    llm_solution: doc.llm_solution ?? null,
  };
}

function toHex(value: unknown): string {
  return value instanceof Types.ObjectId ? value.toHexString() : String(value);
}

function createProblemStore(model: Model<ProblemInput>): ProblemStore {
  return {
    async insert(input) {
      const created = await model.create(input);
      const stored = await model.findById(created._id).lean<LeanProblem>();
      return stored ? toProblem(stored) : null;
    },

    async findById(id) {
      const doc = await model.findById(id).lean<LeanProblem>();
      return doc ? toProblem(doc) : null;
    },

    async replace(id, input) {
      const doc = await model
        .findOneAndReplace({ _id: id }, input, { returnDocument: "after" })
        .lean<LeanProblem>();
      return doc ? toProblem(doc) : null;
    },

    async remove(id) {
      const result = await model.deleteOne({ _id: id });
      return result.deletedCount === 1;
    },

    async list(limit) {
      const docs = await model.find().limit(limit).lean<LeanProblem[]>();
      return docs.map(toProblem);
    },
  };
}

function createTagStore(
  model: Model<Record<string, unknown>>,
  scheme: TagScheme
): TagStore {
  const field = scheme.valueField;
  const toTag = (doc: LeanRecord): Tag => ({
    id: doc._id.toHexString(),
    value: String(doc[field]),
  });

  return {
    async findByValue(value) {
      const doc = await model.findOne({ [field]: value }).lean<LeanRecord>();
      return doc ? toTag(doc) : null;
    },

    async findOrCreate(value) {
      const doc = await model
        .findOneAndUpdate(
          { [field]: value },
          { $setOnInsert: { [field]: value } },
          { upsert: true, returnDocument: "after" }
        )
        .lean<LeanRecord>();
      if (!doc) {
        throw new Error(
          `Upsert into ${scheme.tagCollection} returned no document for '${value}'`
        );
      }
      return toTag(doc);
    },

    async list() {
      const docs = await model.find().lean<LeanRecord[]>();
      return docs.map(toTag);
    },
  };
}

function createBindingStore(
  model: Model<Record<string, unknown>>,
  scheme: TagScheme
): BindingStore {
  const field = scheme.idField;
  const toBinding = (doc: LeanRecord): Binding => ({
    tagId: toHex(doc[field]),
    problemId: toHex(doc.problem_id),
  });

  return {
    async link(tagId, problemId, options) {
      const pair = {
        [field]: new Types.ObjectId(tagId),
        problem_id: new Types.ObjectId(problemId),
      };
      if (!options.unique) {
        await model.create(pair);
        return true;
      }
      const result = await model.updateOne(
        pair,
        { $setOnInsert: pair },
        { upsert: true }
      );
      return result.upsertedCount === 1;
    },

    async problemIdsForTag(tagId) {
      const docs = await model
        .find({ [field]: new Types.ObjectId(tagId) })
        .lean<LeanRecord[]>();
      return docs.map((doc) => toHex(doc.problem_id));
    },

    async removeForProblem(problemId) {
      const result = await model.deleteMany({
        problem_id: new Types.ObjectId(problemId),
      });
      return result.deletedCount;
    },

    async list() {
      const docs = await model.find().lean<LeanRecord[]>();
      return docs.map(toBinding);
    },
  };
}

function tagModel(
  connection: Connection,
  scheme: TagScheme
): Model<Record<string, unknown>> {
  const schema = new Schema<Record<string, unknown>>(
    { [scheme.valueField]: { type: String } },
    { versionKey: false }
  );
  schema.index({ [scheme.valueField]: 1 }, { unique: true });
  return connection.model<Record<string, unknown>>(
    `${scheme.key}Tag`,
    schema,
    scheme.tagCollection
  );
}

function bindingModel(
  connection: Connection,
  scheme: TagScheme
): Model<Record<string, unknown>> {
  const schema = new Schema<Record<string, unknown>>(
    {
      [scheme.idField]: { type: Schema.Types.ObjectId, required: true },
      problem_id: { type: Schema.Types.ObjectId, required: true },
    },
    { versionKey: false }
  );
  if (scheme.uniqueBindings) {
    schema.index({ [scheme.idField]: 1, problem_id: 1 }, { unique: true });
  } else {
    schema.index({ [scheme.idField]: 1 });
  }
  schema.index({ problem_id: 1 });
  return connection.model<Record<string, unknown>>(
    `${scheme.key}Binding`,
    schema,
    scheme.bindingCollection
  );
}

/**
 * Wraps an open connection. Models are registered once per scheme.
 */
export function createMongoDatabase(connection: Connection): Database {
  const problems = createProblemStore(
    connection.model<ProblemInput>("Problem", problemSchema, PROBLEMS_COLLECTION)
  );
  const tagging = new Map<string, TaggingStores>();

  return {
    problems,
    tagging(scheme) {
      let stores = tagging.get(scheme.key);
      if (!stores) {
        stores = {
          tags: createTagStore(tagModel(connection, scheme), scheme),
          bindings: createBindingStore(bindingModel(connection, scheme), scheme),
        };
        tagging.set(scheme.key, stores);
      }
      return stores;
    },
  };
}

export async function connectMongo(
  uri: string,
  dbName: string
): Promise<Connection> {
  const connection = mongoose.createConnection(uri, { dbName });
  await connection.asPromise();
  return connection;
}
