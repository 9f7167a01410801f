import type { ProvisionerRegistry } from "../engines/registry.js";
import type { EngineEndpoint, EngineKind } from "../engines/types.js";
import type { ContainerHost } from "../host/lxc-host.js";

export interface EngineEndpoints {
  engine: EngineKind;
  container: string;
  /** Null when the container has no global IPv4 address (missing or stopped). */
  address: string | null;
  endpoints: EngineEndpoint[];
}

/**
 * Resolve where each engine can be reached from the host, so the benchmark
 * client does not need hard-coded container addresses.
 */
export async function resolveEndpoints(
  host: ContainerHost,
  provisioners: ProvisionerRegistry,
  selection: Iterable<EngineKind>,
): Promise<EngineEndpoints[]> {
  const result: EngineEndpoints[] = [];
  for (const engine of new Set(selection)) {
    const provisioner = provisioners[engine];
    const container = provisioner.defaultContainer;
    const address = await host.ipv4Address(container);
    result.push({
      engine,
      container,
      address,
      endpoints: address ? provisioner.endpoints(address) : [],
    });
  }
  return result;
}
