export {
  BUS_NAME,
  type MemoryBusOptions,
  defaultMemoryBusOptions,
  type RequestNameReply,
  ConnectionError,
  MemoryBus,
  MemoryConnection,
} from "./bus.ts";
