import { z } from "zod";
import type { ConfigPatchWarning } from "./config-patch.js";

/** Search engines this tool can provision, one container each. */
export const ENGINE_KINDS = ["meilisearch", "opensearch", "solr", "quickwit"] as const;

export const engineKindSchema = z.enum(ENGINE_KINDS);
export type EngineKind = z.infer<typeof engineKindSchema>;

export interface EngineEndpoint {
  /** Short label, e.g. "http" or "dashboards". */
  name: string;
  url: string;
}

export interface ProvisionOutcome {
  /** Names of the recipe steps that ran, in order. Skipped steps are not listed. */
  steps: string[];
  warnings: ConfigPatchWarning[];
}

/**
 * One engine's provisioning strategy. The orchestrator only calls
 * provision() after isActive() returned false.
 */
export interface EngineProvisioner {
  readonly kind: EngineKind;
  /** Container name used for this engine when none is given. */
  readonly defaultContainer: string;
  /** systemd units that must all be active for the engine to count as up. */
  readonly services: readonly string[];

  isActive(container: string): Promise<boolean>;
  provision(container: string, signal?: AbortSignal): Promise<ProvisionOutcome>;
  endpoints(address: string): EngineEndpoint[];
}
