import type { Database } from "../lib/db";

export type Bindings = {
  DB: Database;
};

export type AppEnv = {
  Bindings: Bindings;
};
