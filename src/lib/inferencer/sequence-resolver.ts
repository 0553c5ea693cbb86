/**
 * Sequence resolver - one type for the elements of an array, or for the
 * occurrences of a field across merged records
 */

import {
  TypeNode,
  RecordNode,
  ArrayNode,
  PrimitiveNode,
  UnionNode,
  arrayOf,
  isNumericKind,
  primitive,
} from "../../types/type-node.js";
import type { DerivationContext } from "../../types/options.js";
import { Result, ok } from "../../types/result.js";
import { ROOT_PATH, itemPath } from "../../utils/value-path.js";
import { unify } from "./unifier.js";
import { mergeRecordList } from "./record-merger.js";

/** Value families counted apart, so booleans never vote as numbers */
type ValueFamily = "numeric" | "boolean" | "string" | "union";

type Cluster =
  | { category: "record"; first: number; members: RecordNode[] }
  | { category: "array"; first: number; members: ArrayNode[] }
  | { category: "value"; family: ValueFamily; first: number; size: number; type: TypeNode };

function clusterSize(cluster: Cluster): number {
  return cluster.category === "value" ? cluster.size : cluster.members.length;
}

function valueFamily(type: PrimitiveNode | UnionNode): ValueFamily {
  if (type.kind === "union") {
    return "union";
  }
  if (isNumericKind(type.type)) {
    return "numeric";
  }
  return type.type === "boolean" ? "boolean" : "string";
}

function foldUnify(
  types: readonly TypeNode[],
  context: DerivationContext,
  path: string,
): Result<TypeNode> {
  let acc: TypeNode = primitive("null");
  for (const type of types) {
    const unified = unify(acc, type, context, path);
    if (!unified.ok) {
      return unified;
    }
    acc = unified.value;
  }
  return ok(acc);
}

/**
 * Group occurrences so that every record lands in one cluster, every array
 * in another, and each remaining value joins the first cluster of its
 * family it unifies with. Clusters are created in first-occurrence order.
 */
function buildClusters(types: readonly TypeNode[], context: DerivationContext): Cluster[] {
  const clusters: Cluster[] = [];
  let records: RecordNode[] | undefined;
  let arrays: ArrayNode[] | undefined;

  types.forEach((type, index) => {
    if (type.kind === "record") {
      if (records) {
        records.push(type);
      } else {
        records = [type];
        clusters.push({ category: "record", first: index, members: records });
      }
      return;
    }
    if (type.kind === "array") {
      if (arrays) {
        arrays.push(type);
      } else {
        arrays = [type];
        clusters.push({ category: "array", first: index, members: arrays });
      }
      return;
    }
    if (type.kind === "primitive" && type.type === "null") {
      return;
    }

    const family = valueFamily(type);
    for (const cluster of clusters) {
      if (cluster.category !== "value" || cluster.family !== family) {
        continue;
      }
      const unified = unify(cluster.type, type, context);
      if (unified.ok) {
        cluster.type = unified.value;
        cluster.size += 1;
        return;
      }
    }
    clusters.push({ category: "value", family, first: index, size: 1, type });
  });

  return clusters;
}

function resolveCluster(
  cluster: Cluster,
  context: DerivationContext,
  path: string,
): Result<TypeNode> {
  switch (cluster.category) {
    case "value":
      return ok(cluster.type);
    case "record":
      return mergeRecordList(cluster.members, context, path);
    case "array": {
      const items = resolveSequence(
        cluster.members.map((member) => member.items),
        context,
        itemPath(path),
      );
      if (!items.ok) {
        return items;
      }
      return ok(arrayOf(items.value, cluster.members[0]?.name));
    }
  }
}

/**
 * Majority resolution: the largest cluster wins and ties go to the cluster
 * that occurs first.
 */
function resolveByMajority(
  types: readonly TypeNode[],
  context: DerivationContext,
  path: string,
): Result<TypeNode> {
  let winner: Cluster | undefined;
  for (const cluster of buildClusters(types, context)) {
    if (
      winner === undefined ||
      clusterSize(cluster) > clusterSize(winner) ||
      (clusterSize(cluster) === clusterSize(winner) && cluster.first < winner.first)
    ) {
      winner = cluster;
    }
  }

  return winner === undefined ? ok(primitive("null")) : resolveCluster(winner, context, path);
}

/**
 * Resolve a sequence of occurrence types into one type.
 *
 * Strict mode folds with `unify` and reports the first conflict. Lenient
 * mode never fails on a conflict: occurrences are counted by family
 * (numeric, boolean, string, record, array) and the majority family wins,
 * so `[0, 1, true, true, true]` resolves to boolean while `[1.5, true]`
 * resolves to double. Records take their most frequent field set.
 */
export function resolveSequence(
  types: readonly TypeNode[],
  context: DerivationContext,
  path: string = ROOT_PATH,
): Result<TypeNode> {
  if (context.mode === "strict") {
    return foldUnify(types, context, path);
  }
  return resolveByMajority(types, context, path);
}
