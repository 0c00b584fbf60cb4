import path from "path";
import { RouteError } from "../errors";
import { PartitionTable } from "./partitions";

/**
 * Translate a route into a physical path.
 * @throws RouteError if the route is empty or its partition is unknown
 */
export function resolveRoute(partitions: PartitionTable, route: readonly string[]): string {
  const [partitionName, ...rest] = route;
  if (partitionName === undefined) {
    throw new RouteError(route);
  }

  const root = partitions.get(partitionName);
  if (root === undefined) {
    throw new RouteError(route);
  }

  // A bare partition route is the root itself, never root + separator.
  if (rest.length === 0) {
    return root;
  }

  return path.join(root, ...rest);
}
