export type TagSchemeKey = "name" | "type";

/**
 * A tagging scheme: where its tags and bindings live, how its routes are
 * named, and the three behaviours in which the schemes differ.
 */
export interface TagScheme {
  key: TagSchemeKey;
  /** Field holding the tag value, in the tag collection and in assign bodies */
  valueField: string;
  /** Field holding the tag id in the binding collection */
  idField: string;
  tagCollection: string;
  bindingCollection: string;
  routes: {
    assign: string;
    query: string;
    queryParam: string;
    list: string;
    debugBindings: string;
    debugTags: string;
  };
  /** Refuse a second binding for the same (tag, problem) pair */
  uniqueBindings: boolean;
  /** What a query for an unknown tag value answers with */
  missingTag: "empty" | "not-found";
  /** Drop this scheme's bindings when their problem is deleted */
  cascadeOnProblemDelete: boolean;
  messages: {
    assigned: (problemId: string, value: string) => string;
    alreadyAssigned: (problemId: string, value: string) => string;
    tagNotFound: string;
  };
}

export const TAG_SCHEMES: TagScheme[] = [
  {
    key: "type",
    valueField: "type_name",
    idField: "type_id",
    tagCollection: "types_collection",
    bindingCollection: "type_binding_collection",
    routes: {
      assign: "/api/assign_type",
      query: "/api/get_problems_by_type",
      queryParam: "problem_type",
      list: "/api/types",
      debugBindings: "/api/debug/all_type_bindings",
      debugTags: "/api/debug/all_types_with_ids",
    },
    uniqueBindings: true,
    missingTag: "empty",
    cascadeOnProblemDelete: true,
    messages: {
      assigned: (problemId, value) =>
        `Задаче: '${problemId}' присвоен тип '${value}'`,
      alreadyAssigned: (problemId, value) =>
        `Тип '${value}' уже присвоен задаче '${problemId}'`,
      tagNotFound: "Тип не найден",
    },
  },
  // Earlier API revision. Its quirks (duplicate bindings, 404 on an unknown
  // name, bindings surviving problem deletion) are kept for existing data.
  {
    key: "name",
    valueField: "name",
    idField: "name_id",
    tagCollection: "names_collection",
    bindingCollection: "binding_collection",
    routes: {
      assign: "/api/give_a_name",
      query: "/api/get_problems_by_name",
      queryParam: "problem_name",
      list: "/api/names",
      debugBindings: "/api/debug/all_name_bindings",
      debugTags: "/api/debug/all_names_with_ids",
    },
    uniqueBindings: false,
    missingTag: "not-found",
    cascadeOnProblemDelete: false,
    messages: {
      assigned: (problemId, value) =>
        `Задаче: '${problemId}' присвоено имя '${value}'`,
      alreadyAssigned: (problemId, value) =>
        `Имя '${value}' уже присвоено задаче '${problemId}'`,
      tagNotFound: "Имя не найдено",
    },
  },
];

export function getSchemeByKey(key: TagSchemeKey): TagScheme {
  const scheme = TAG_SCHEMES.find((candidate) => candidate.key === key);
  if (!scheme) {
    throw new Error(`Unknown tag scheme: ${key}`);
  }
  return scheme;
}

export function getAllSchemes(): TagScheme[] {
  return TAG_SCHEMES;
}
