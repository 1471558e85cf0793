// busbind-xmlgen: generate bindings from an introspection file or a live
// object.
//
// Output goes to stdout, diagnostics to stderr. IO and bus access are
// injected so the command runs in tests without a bus.

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import createDebug from "debug";
import yargs from "yargs";
import { isObjectPath } from "@busbind/signature";
import { isValidBusName } from "@busbind/wire";
import { type IntrospectionNode, parseIntrospection } from "@busbind/model";
import { IntrospectableProxy } from "@busbind/core";
import { type DbusNextConnection, connectAddress, connectSessionBus, connectSystemBus } from "@busbind/dbus-next";
import { describeInterface, generateModule } from "./module.ts";
import { GENERATOR_NAME } from "./version.ts";

const log = createDebug("busbind:xmlgen");

export const USAGE = `Usage:
  ${GENERATOR_NAME} <interface.xml>
  ${GENERATOR_NAME} --system|--session <service> <object_path>
  ${GENERATOR_NAME} --address <address> <service> <object_path>
`;

/** A live object to introspect. */
export type BusTarget =
  | { bus: "system" | "session"; service: string; path: string }
  | { bus: "address"; address: string; service: string; path: string };

export interface XmlgenIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Promise<string>;
  /** Fetch the introspection document of a live object. */
  introspect(target: BusTarget): Promise<string>;
}

export type XmlgenErrorKind = "usage" | "input";

export class XmlgenError extends Error {
  constructor(
    public readonly kind: XmlgenErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "XmlgenError";
  }

  static usage(message: string): XmlgenError {
    return new XmlgenError("usage", message);
  }

  /** Reading, fetching or parsing `source` failed. */
  static input(source: string, cause: unknown): XmlgenError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new XmlgenError("input", `${source}: ${detail}`, { cause });
  }
}

type Source = { kind: "file"; file: string } | { kind: "bus"; target: BusTarget };

interface Input {
  node: IntrospectionNode;
  inputSource: string;
  service?: string;
  path?: string;
}

// ============================================================================
// Arguments
// ============================================================================

export function buildCli(argv: string[]) {
  return yargs(argv)
    .scriptName(GENERATOR_NAME)
    .usage(USAGE)
    .help(false)
    .version(false)
    .option("system", { type: "boolean", default: false, describe: "Introspect an object on the system bus" })
    .option("session", { type: "boolean", default: false, describe: "Introspect an object on the session bus" })
    .option("address", { type: "string", describe: "Introspect an object on the bus at this D-Bus address" })
    .option("help", { alias: "h", type: "boolean", default: false, describe: "Show usage" })
    .parserConfiguration({ "parse-positional-numbers": false })
    .strictOptions()
    .exitProcess(false)
    .fail(false);
}

async function parseArgs(argv: string[]) {
  try {
    return await buildCli(argv).parseAsync();
  } catch (e) {
    throw XmlgenError.usage(e instanceof Error ? e.message : String(e));
  }
}

function sourceOf(args: { system: boolean; session: boolean; address?: string }, positionals: string[]): Source {
  const modes: string[] = [];
  if (args.system) modes.push("--system");
  if (args.session) modes.push("--session");
  if (args.address !== undefined) modes.push("--address");
  if (modes.length > 1) {
    throw XmlgenError.usage(`${modes.join(" and ")} cannot be combined`);
  }

  if (modes.length === 0) {
    if (positionals.length !== 1) {
      throw XmlgenError.usage(`expected one introspection file, got ${positionals.length} arguments`);
    }
    return { kind: "file", file: positionals[0] };
  }

  if (positionals.length !== 2) {
    throw XmlgenError.usage(`${modes[0]} takes <service> <object_path>`);
  }
  const [service, path] = positionals;
  if (!isValidBusName(service)) {
    throw XmlgenError.usage(`invalid service name "${service}"`);
  }
  if (!isObjectPath(path)) {
    throw XmlgenError.usage(`invalid object path "${path}"`);
  }
  if (args.address !== undefined) {
    if (args.address === "") {
      throw XmlgenError.usage("--address needs an address");
    }
    return { kind: "bus", target: { bus: "address", address: args.address, service, path } };
  }
  return { kind: "bus", target: { bus: args.system ? "system" : "session", service, path } };
}

// ============================================================================
// Input
// ============================================================================

function describeTarget(target: BusTarget): string {
  const object = `Interface '${target.path}' from service '${target.service}'`;
  return target.bus === "address" ? object : `${object} on ${target.bus} bus`;
}

async function readInput(source: Source, io: XmlgenIo): Promise<Input> {
  if (source.kind === "file") {
    try {
      const node = parseIntrospection(await io.readFile(source.file));
      return { node, inputSource: basename(source.file) };
    } catch (e) {
      throw XmlgenError.input(source.file, e);
    }
  }

  const { target } = source;
  log("introspecting %s at %s (%s)", target.service, target.path, target.bus);
  try {
    const node = parseIntrospection(await io.introspect(target));
    return { node, inputSource: describeTarget(target), service: target.service, path: target.path };
  } catch (e) {
    throw XmlgenError.input(`${target.service} at ${target.path}`, e);
  }
}

// ============================================================================
// Command
// ============================================================================

/**
 * Run the command and return its exit status: 0 on success, 1 when the
 * input cannot be read or parsed, 2 for bad arguments.
 */
export async function runXmlgen(argv: string[], io: XmlgenIo): Promise<number> {
  try {
    const args = await parseArgs(argv);
    const positionals = args._.map(String);
    const anyMode = args.system || args.session || args.address !== undefined;
    if (args.help || (!anyMode && positionals.length === 0)) {
      io.stderr(USAGE);
      return 0;
    }

    const input = await readInput(sourceOf(args, positionals), io);
    for (const spec of input.node.interfaces) {
      log("%s", describeInterface(spec));
    }
    io.stdout(generateModule(input.node, input));
    return 0;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    io.stderr(`${GENERATOR_NAME}: ${message}\n`);
    if (e instanceof XmlgenError && e.kind === "usage") {
      io.stderr(USAGE);
      return 2;
    }
    log("failed: %O", e);
    return 1;
  }
}

// ============================================================================
// Process IO
// ============================================================================

function connect(target: BusTarget): DbusNextConnection {
  switch (target.bus) {
    case "system":
      return connectSystemBus();
    case "session":
      return connectSessionBus();
    case "address":
      return connectAddress(target.address);
  }
}

async function introspectLive(target: BusTarget): Promise<string> {
  const connection = connect(target);
  try {
    const proxy = new IntrospectableProxy(connection.transport, { destination: target.service, path: target.path });
    return await proxy.introspect();
  } finally {
    connection.disconnect();
  }
}

/** IO over the process streams, the filesystem and dbus-next. */
export function nodeIo(): XmlgenIo {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    readFile: (path) => readFile(path, "utf8"),
    introspect: introspectLive,
  };
}
