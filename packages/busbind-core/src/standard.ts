// Standard interfaces and their proxies.

import type { Variant } from "@busbind/signature";
import { type BusTransport, StandardInterface } from "@busbind/wire";
import { type InterfaceSpec, defineInterface } from "@busbind/model";
import { ProxyBase, type ProxyOptions } from "./proxy.ts";
import type { SignalStream } from "./signal.ts";

export const IntrospectableSpec: InterfaceSpec = defineInterface({
  name: StandardInterface.Introspectable,
  methods: {
    introspect: { out: { name: "xml_data", type: "s" } },
  },
});

export const PropertiesSpec: InterfaceSpec = defineInterface({
  name: StandardInterface.Properties,
  methods: {
    get: {
      in: [
        { name: "interface_name", type: "s" },
        { name: "property_name", type: "s" },
      ],
      out: { name: "value", type: "v" },
    },
    set: {
      in: [
        { name: "interface_name", type: "s" },
        { name: "property_name", type: "s" },
        { name: "value", type: "v" },
      ],
    },
    get_all: {
      in: [{ name: "interface_name", type: "s" }],
      out: { name: "props", type: "a{sv}" },
    },
  },
  signals: {
    properties_changed: {
      args: [
        { name: "interface_name", type: "s" },
        { name: "changed_properties", type: "a{sv}" },
        { name: "invalidated_properties", type: "as" },
      ],
    },
  },
});

export const PeerSpec: InterfaceSpec = defineInterface({
  name: StandardInterface.Peer,
  methods: {
    ping: {},
    get_machine_id: { out: { name: "machine_uuid", type: "s" } },
  },
});

export const ObjectManagerSpec: InterfaceSpec = defineInterface({
  name: StandardInterface.ObjectManager,
  methods: {
    get_managed_objects: {
      out: { name: "object_paths_interfaces_and_properties", type: "a{oa{sa{sv}}}" },
    },
  },
  signals: {
    interfaces_added: {
      args: [
        { name: "object_path", type: "o" },
        { name: "interfaces_and_properties", type: "a{sa{sv}}" },
      ],
    },
    interfaces_removed: {
      args: [
        { name: "object_path", type: "o" },
        { name: "interfaces", type: "as" },
      ],
    },
  },
});

export class IntrospectableProxy extends ProxyBase {
  constructor(transport: BusTransport, options: ProxyOptions) {
    super(IntrospectableSpec, transport, options);
  }

  introspect(): Promise<string> {
    return this.callMethod<string>("Introspect");
  }
}

export class PropertiesProxy extends ProxyBase {
  constructor(transport: BusTransport, options: ProxyOptions) {
    super(PropertiesSpec, transport, options);
  }

  get(interfaceName: string, propertyName: string): Promise<Variant> {
    return this.callMethod<Variant>("Get", [interfaceName, propertyName]);
  }

  set(interfaceName: string, propertyName: string, value: Variant): Promise<void> {
    return this.callMethod<void>("Set", [interfaceName, propertyName, value]);
  }

  getAll(interfaceName: string): Promise<Map<string, Variant>> {
    return this.callMethod<Map<string, Variant>>("GetAll", [interfaceName]);
  }

  receivePropertiesChanged(): SignalStream<[string, Map<string, Variant>, string[]]> {
    return this.receiveSignal<[string, Map<string, Variant>, string[]]>("PropertiesChanged");
  }
}

export class PeerProxy extends ProxyBase {
  constructor(transport: BusTransport, options: ProxyOptions) {
    super(PeerSpec, transport, options);
  }

  ping(): Promise<void> {
    return this.callMethod<void>("Ping");
  }

  getMachineId(): Promise<string> {
    return this.callMethod<string>("GetMachineId");
  }
}

export type ManagedObjects = Map<string, Map<string, Map<string, Variant>>>;

export class ObjectManagerProxy extends ProxyBase {
  constructor(transport: BusTransport, options: ProxyOptions) {
    super(ObjectManagerSpec, transport, options);
  }

  getManagedObjects(): Promise<ManagedObjects> {
    return this.callMethod<ManagedObjects>("GetManagedObjects");
  }

  receiveInterfacesAdded(): SignalStream<[string, Map<string, Map<string, Variant>>]> {
    return this.receiveSignal<[string, Map<string, Map<string, Variant>>]>("InterfacesAdded");
  }

  receiveInterfacesRemoved(): SignalStream<[string, string[]]> {
    return this.receiveSignal<[string, string[]]>("InterfacesRemoved");
  }
}
