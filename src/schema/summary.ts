/**
 * Node-type and property-key inventory of filtered graphs.
 *
 * "any" views union a type's keys over its nodes; "all" views intersect
 * them, so a key only counts when every node of that type carries it.
 * The `label` key names the type and is never listed as a property.
 *
 * @module schema/summary
 */

import { compareIds, type Graph } from "../dot/types.js";

export interface TypeProperties {
  any: Set<string>;
  all: Set<string>;
}

export interface GraphSchemaSummary {
  types: Map<string, TypeProperties>;
}

export function summarizeGraphSchema(graph: Graph): GraphSchemaSummary {
  const types = new Map<string, TypeProperties>();

  for (const node of graph.nodes.values()) {
    const type = node.attributes.get("label");
    if (type === undefined) continue;

    const keys = new Set(node.attributes.keys());
    keys.delete("label");

    const existing = types.get(type);
    if (!existing) {
      types.set(type, { any: new Set(keys), all: new Set(keys) });
      continue;
    }
    for (const key of keys) {
      existing.any.add(key);
    }
    for (const key of existing.all) {
      if (!keys.has(key)) existing.all.delete(key);
    }
  }

  return { types };
}

function sorted(values: Iterable<string>): string[] {
  return Array.from(values).sort(compareIds);
}

function union(sets: readonly ReadonlySet<string>[]): Set<string> {
  const result = new Set<string>();
  for (const set of sets) {
    for (const value of set) result.add(value);
  }
  return result;
}

function intersection(sets: readonly ReadonlySet<string>[]): Set<string> {
  const [first, ...rest] = sets;
  if (!first) return new Set();
  return new Set([...first].filter((value) => rest.every((set) => set.has(value))));
}

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  return new Set([...a].filter((value) => !b.has(value)));
}

export interface NodeTypesReport {
  files: string[];
  intersectional_types: string[];
  non_intersectional_types: { type: string; present_in: string[] }[];
  presence_matrix: Record<string, Record<string, 0 | 1>>;
}

export interface TypePropertiesReport {
  files_present_in: string[];
  lenient: { intersection: string[]; non_intersection: string[]; union: string[] };
  strict: {
    intersection_all_nodes: string[];
    non_intersection_all_nodes: string[];
    union_all_nodes: string[];
  };
  by_file: Record<string, { any: string[]; all: string[] }>;
}

export interface CrossTypesReport {
  lenient: {
    intersection_across_types: string[];
    union_across_types: string[];
    non_intersection_across_types: string[];
    coverage: Record<string, string[]>;
  };
  strict: {
    intersection_across_types_all_nodes: string[];
    union_across_types_all_nodes: string[];
    non_intersection_across_types_all_nodes: string[];
  };
}

export interface SchemaAggregate {
  nodeTypes: NodeTypesReport;
  propertiesByType: Record<string, TypePropertiesReport>;
  crossTypes: CrossTypesReport;
  globalPropertyUnion: string[];
}

/** Combines per-file summaries, keyed by file name, into dataset views. */
export function aggregateSchemas(
  perFile: ReadonlyMap<string, GraphSchemaSummary>,
): SchemaAggregate {
  const files = sorted(perFile.keys());
  const typeSets = files.map((file) => new Set(perFile.get(file)?.types.keys() ?? []));
  const allTypes = union(typeSets);
  const sharedTypes = intersection(typeSets);

  const presentIn = (type: string): string[] =>
    files.filter((file) => perFile.get(file)?.types.has(type) ?? false);

  const presenceMatrix: Record<string, Record<string, 0 | 1>> = {};
  for (const type of sorted(allTypes)) {
    const row: Record<string, 0 | 1> = {};
    for (const file of files) {
      row[file] = perFile.get(file)?.types.has(type) ? 1 : 0;
    }
    presenceMatrix[type] = row;
  }

  const propertiesByType: Record<string, TypePropertiesReport> = {};
  const unionAnyByType = new Map<string, Set<string>>();
  const intersectionAllByType = new Map<string, Set<string>>();

  for (const type of sorted(allTypes)) {
    const filesWithType = presentIn(type);
    const byFile: Record<string, { any: string[]; all: string[] }> = {};
    const anySets: Set<string>[] = [];
    const allSets: Set<string>[] = [];

    for (const file of filesWithType) {
      const props = perFile.get(file)?.types.get(type);
      if (!props) continue;
      anySets.push(props.any);
      allSets.push(props.all);
      byFile[file] = { any: sorted(props.any), all: sorted(props.all) };
    }

    const unionAny = union(anySets);
    const intersectionAny = intersection(anySets);
    const unionAll = union(allSets);
    const intersectionAll = intersection(allSets);
    unionAnyByType.set(type, unionAny);
    intersectionAllByType.set(type, intersectionAll);

    propertiesByType[type] = {
      files_present_in: filesWithType,
      lenient: {
        intersection: sorted(intersectionAny),
        non_intersection: sorted(difference(unionAny, intersectionAny)),
        union: sorted(unionAny),
      },
      strict: {
        intersection_all_nodes: sorted(intersectionAll),
        non_intersection_all_nodes: sorted(difference(unionAll, intersectionAll)),
        union_all_nodes: sorted(unionAll),
      },
      by_file: byFile,
    };
  }

  const anyViews = [...unionAnyByType.values()];
  const allViews = [...intersectionAllByType.values()];
  const interAny = intersection(anyViews);
  const unionAnyAcross = union(anyViews);
  const interAll = intersection(allViews);
  const unionAllAcross = union(allViews);

  const coverage: Record<string, string[]> = {};
  for (const property of sorted(unionAnyAcross)) {
    coverage[property] = sorted(allTypes).filter(
      (type) => unionAnyByType.get(type)?.has(property) ?? false,
    );
  }

  return {
    nodeTypes: {
      files,
      intersectional_types: sorted(sharedTypes),
      non_intersectional_types: sorted(difference(allTypes, sharedTypes)).map((type) => ({
        type,
        present_in: presentIn(type),
      })),
      presence_matrix: presenceMatrix,
    },
    propertiesByType,
    crossTypes: {
      lenient: {
        intersection_across_types: sorted(interAny),
        union_across_types: sorted(unionAnyAcross),
        non_intersection_across_types: sorted(difference(unionAnyAcross, interAny)),
        coverage,
      },
      strict: {
        intersection_across_types_all_nodes: sorted(interAll),
        union_across_types_all_nodes: sorted(unionAllAcross),
        non_intersection_across_types_all_nodes: sorted(difference(unionAllAcross, interAll)),
      },
    },
    globalPropertyUnion: sorted(unionAnyAcross),
  };
}
