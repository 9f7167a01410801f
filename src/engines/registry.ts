import type { Config } from "../config/index.js";
import type { ContainerHost } from "../host/lxc-host.js";
import { MeilisearchProvisioner } from "./meilisearch.js";
import { OpenSearchProvisioner } from "./opensearch.js";
import { QuickwitProvisioner } from "./quickwit.js";
import { SolrProvisioner } from "./solr.js";
import type { EngineKind, EngineProvisioner } from "./types.js";

export type ProvisionerRegistry = Record<EngineKind, EngineProvisioner>;

/** Build one provisioner per engine kind, wired to the given host. */
export function createProvisioners(host: ContainerHost, cfg: Pick<Config, "opensearch" | "solr">): ProvisionerRegistry {
  return {
    meilisearch: new MeilisearchProvisioner(host),
    opensearch: new OpenSearchProvisioner(host, {
      adminPassword: cfg.opensearch.adminPassword,
      majorLine: cfg.opensearch.majorLine,
    }),
    solr: new SolrProvisioner(host, { version: cfg.solr.version, core: cfg.solr.core }),
    quickwit: new QuickwitProvisioner(host),
  };
}
