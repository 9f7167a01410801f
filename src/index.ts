export { type Config, buildConfig, config, parseEngineList } from "./config/index.js";
export {
  type ContainerManagerOptions,
  type ContainerOutcome,
  ContainerManager,
  type ContainerStatus,
} from "./containers/container-manager.js";
export {
  applyPatches,
  type ConfigPatchWarning,
  insertAfter,
  type PatchOp,
  type PatchReport,
  replaceLine,
} from "./engines/config-patch.js";
export { MeilisearchProvisioner } from "./engines/meilisearch.js";
export { OpenSearchProvisioner, type OpenSearchOptions } from "./engines/opensearch.js";
export { QuickwitProvisioner } from "./engines/quickwit.js";
export { RecipeProvisioner, type RecipeStep, runRecipe } from "./engines/recipe.js";
export { createProvisioners, type ProvisionerRegistry } from "./engines/registry.js";
export { SolrProvisioner, type SolrOptions } from "./engines/solr.js";
export { renderUnit, type ServiceUnit } from "./engines/systemd-unit.js";
export {
  ENGINE_KINDS,
  type EngineEndpoint,
  type EngineKind,
  type EngineProvisioner,
  type ProvisionOutcome,
} from "./engines/types.js";
export { type ProfileOutcome, ProfileManager } from "./environment/profile-manager.js";
export { renderProfileDocument, type ResourceProfileSpec } from "./environment/profile-schema.js";
export { type CommandResult, type CommandRunner, SpawnCommandRunner } from "./host/command-runner.js";
export {
  BootTimeoutError,
  ContainerLaunchError,
  FetchError,
  HostUnavailableError,
  ProvisionStepError,
} from "./host/errors.js";
export { KeyedMutex } from "./host/keyed-mutex.js";
export { type ContainerHost, LxcHost } from "./host/lxc-host.js";
export { type EngineReport, OrchestrationDriver, type RunReport } from "./orchestrator/driver.js";
export { type EngineEndpoints, resolveEndpoints } from "./orchestrator/endpoints.js";
export { formatSummary } from "./orchestrator/report.js";
export { createEnvironment, type Environment } from "./orchestrator/services.js";
