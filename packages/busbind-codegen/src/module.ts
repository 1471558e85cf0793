// Generated module: header, imports and one block per interface.

import { typeToString } from "@busbind/signature";
import { type InterfaceSpec, type IntrospectionNode, partitionInterfaces } from "@busbind/model";
import { type InterfacePlan, generatePlanned, planInterface } from "./generate.ts";
import { typeNameOf } from "./naming.ts";
import { usesVariant } from "./types.ts";
import { GENERATOR_NAME, GENERATOR_VERSION } from "./version.ts";

export interface ModuleOptions {
  /** Where the introspection data came from, e.g. a file name. */
  inputSource: string;
  /** Default destination of the generated proxies. */
  service?: string;
  /** Default object path of the generated proxies. */
  path?: string;
}

/** Names the generated module imports; interface type names must not collide with them. */
const IMPORTED_NAMES: ReadonlySet<string> = new Set([
  "Variant",
  "BusTransport",
  "InterfaceSpec",
  "defineInterface",
  "InterfaceDispatcher",
  "MethodContext",
  "PropertyChange",
  "ProxyBase",
  "ProxyOptions",
  "SignalContext",
  "SignalStream",
  "createDispatcher",
]);

function collides(typeName: string): boolean {
  return [`${typeName}Spec`, `${typeName}Proxy`, `${typeName}Handlers`, `create${typeName}Dispatcher`].some((name) =>
    IMPORTED_NAMES.has(name),
  );
}

/** Type names for several interfaces, numbered where their last elements repeat. */
export function typeNamesFor(specs: readonly InterfaceSpec[]): string[] {
  const taken = new Set<string>();
  return specs.map((spec) => {
    const base = typeNameOf(spec.name);
    let candidate = base;
    for (let n = 2; taken.has(candidate) || collides(candidate); n++) {
      candidate = `${base}${n}`;
    }
    taken.add(candidate);
    return candidate;
  });
}

function headerLines(needed: readonly InterfaceSpec[], standard: readonly InterfaceSpec[], inputSource: string): string[] {
  const lines: string[] = [];
  const names = needed.map((spec) => `\`${spec.name}\``);
  if (names.length === 1) {
    lines.push(`// D-Bus interface proxy for: ${names[0]}`, "//");
  } else if (names.length > 1) {
    lines.push(`// D-Bus interface proxies for: ${names.join(", ")}`, "//");
  }
  lines.push(
    `// This code was generated by \`${GENERATOR_NAME}\` \`${GENERATOR_VERSION}\` from D-Bus introspection data.`,
    `// Source: \`${inputSource}\`.`,
    "//",
    "// You may prefer to adapt it, instead of using it verbatim.",
  );
  if (standard.length > 0) {
    lines.push(
      "//",
      "// This D-Bus object implements standard D-Bus interfaces (`org.freedesktop.DBus.*`),",
      "// for which the following @busbind/core proxies can be used:",
      "//",
      ...standard.map((spec) => `// * \`${typeNameOf(spec.name)}Proxy\``),
      "//",
      `// …consequently \`${GENERATOR_NAME}\` did not generate code for the above interfaces.`,
    );
  }
  return lines;
}

function planUsesVariant(plan: InterfacePlan): boolean {
  const { spec } = plan;
  return (
    spec.methods.some((m) => [...m.inputs, ...m.outputs].some((arg) => usesVariant(arg.type))) ||
    spec.properties.some((p) => usesVariant(p.type)) ||
    spec.signals.some((s) => s.args.some((arg) => usesVariant(arg.type)))
  );
}

/** Import statements covering everything the given blocks use. */
export function importLines(plans: readonly InterfacePlan[]): string[] {
  if (plans.length === 0) return [];
  const core = ["type InterfaceDispatcher"];
  if (plans.some((plan) => plan.methods.length > 0)) core.push("type MethodContext");
  if (plans.some((plan) => plan.properties.some((p) => p.changes !== undefined))) core.push("type PropertyChange");
  core.push("type ProxyOptions");
  if (plans.some((plan) => plan.properties.some((p) => p.access !== "read"))) core.push("type SignalContext");
  if (plans.some((plan) => plan.signals.length > 0)) core.push("type SignalStream");
  core.push("ProxyBase", "createDispatcher");

  const lines: string[] = [];
  if (plans.some(planUsesVariant)) {
    lines.push('import type { Variant } from "@busbind/signature";');
  }
  lines.push(
    'import type { BusTransport } from "@busbind/wire";',
    'import { type InterfaceSpec, defineInterface } from "@busbind/model";',
    "import {",
    ...core.map((name) => `  ${name},`),
    '} from "@busbind/core";',
  );
  return lines;
}

/**
 * Generate a module for an introspected object.
 *
 * Standard interfaces (`org.freedesktop.DBus.*`) are listed in the header
 * and skipped; every other interface gets a block.
 */
export function generateModule(node: IntrospectionNode, options: ModuleOptions): string {
  const { standard, needed } = partitionInterfaces(node);
  const typeNames = typeNamesFor(needed);
  const plans = needed.map((spec, i) => planInterface(spec, typeNames[i]));

  const sections = [headerLines(needed, standard, options.inputSource).join("\n")];
  const imports = importLines(plans);
  if (imports.length > 0) sections.push(imports.join("\n"));
  for (const plan of plans) {
    sections.push(generatePlanned(plan, { service: options.service, path: options.path }).trimEnd());
  }
  return `${sections.join("\n\n")}\n`;
}

/** Signature text of every member, for logging what a module covers. */
export function describeInterface(spec: InterfaceSpec): string {
  const methods = spec.methods.map((m) => `${m.wireName}(${m.inputs.map((a) => typeToString(a.type)).join("")})`);
  return `${spec.name}: ${methods.length} methods, ${spec.properties.length} properties, ${spec.signals.length} signals${
    methods.length > 0 ? ` [${methods.join(" ")}]` : ""
  }`;
}
