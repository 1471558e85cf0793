// BusTransport over dbus-next, for system and session buses.

export {
  type DbusNextBus,
  type DbusNextTransportOptions,
  defaultDbusNextTransportOptions,
  toDbusNextMessage,
  fromDbusNextMessage,
  DbusNextTransport,
  type DbusNextConnection,
  connectSystemBus,
  connectSessionBus,
  connectAddress,
} from "./transport.ts";

export { toDbusNext, fromDbusNext, bodyToDbusNext, bodyFromDbusNext } from "./values.ts";
