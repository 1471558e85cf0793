// Standard interface names.

/** Prefix of the interfaces every D-Bus peer may implement. */
export const STANDARD_INTERFACE_PREFIX = "org.freedesktop.DBus";

export const StandardInterface = {
  Introspectable: "org.freedesktop.DBus.Introspectable",
  Properties: "org.freedesktop.DBus.Properties",
  Peer: "org.freedesktop.DBus.Peer",
  ObjectManager: "org.freedesktop.DBus.ObjectManager",
} as const;

/** Check whether an interface is one of the `org.freedesktop.DBus.*` interfaces. */
export function isStandardInterface(name: string): boolean {
  return name.startsWith(STANDARD_INTERFACE_PREFIX);
}

const NAME_ELEMENT = /^[A-Za-z0-9_-]+$/;

/**
 * Check a bus name: a unique name (`:1.42`) or a well-known name
 * (`org.example.Service`).
 */
export function isValidBusName(name: string): boolean {
  if (name.length === 0 || name.length > 255) return false;
  const unique = name.startsWith(":");
  const elements = (unique ? name.slice(1) : name).split(".");
  if (elements.length < 2) return false;
  return elements.every((element) => NAME_ELEMENT.test(element) && (unique || !/^[0-9]/.test(element)));
}
