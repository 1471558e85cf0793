import { isStandardInterface } from "@busbind/wire";
import type { InterfaceSpec, IntrospectionNode } from "../model.ts";

export interface PartitionedInterfaces {
  /** Interfaces under `org.freedesktop.DBus`, served by existing proxies. */
  standard: InterfaceSpec[];
  /** Everything else. */
  needed: InterfaceSpec[];
}

/** Split a node's interfaces into standard and application interfaces. */
export function partitionInterfaces(node: IntrospectionNode): PartitionedInterfaces {
  const standard: InterfaceSpec[] = [];
  const needed: InterfaceSpec[] = [];
  for (const spec of node.interfaces) {
    (isStandardInterface(spec.name) ? standard : needed).push(spec);
  }
  return { standard, needed };
}
