import type { ContainerHost } from "../host/lxc-host.js";
import { insertAfter, replaceLine } from "./config-patch.js";
import { aptInstall, aptUpdate, RecipeProvisioner, type RecipeStep, systemctl } from "./recipe.js";
import type { EngineEndpoint } from "./types.js";

export const OPENSEARCH_PORT = 9200;
export const DASHBOARDS_PORT = 5601;

const KEY_URL = "https://artifacts.opensearch.org/publickeys/opensearch.pgp";
const KEYRING = "/usr/share/keyrings/opensearch-keyring";
const ENGINE_CONFIG = "/etc/opensearch/opensearch.yml";
const DASHBOARDS_CONFIG = "/etc/opensearch-dashboards/opensearch_dashboards.yml";

export interface OpenSearchOptions {
  /**
   * Initial admin password handed to the package's install script. Test
   * environments only; the benchmark client authenticates with it.
   */
  adminPassword: string;
  /** Release line of the vendor APT repository, e.g. "2.x". */
  majorLine?: string;
}

/** APT source line for one of the vendor's bundle repositories. */
export function aptSourceLine(bundle: "opensearch" | "opensearch-dashboards", majorLine: string): string {
  return `deb [signed-by=${KEYRING}] https://artifacts.opensearch.org/releases/bundle/${bundle}/${majorLine}/apt stable main\n`;
}

/**
 * OpenSearch plus OpenSearch Dashboards from the vendor APT repositories.
 * Installed in two phases; both units must be active.
 */
export class OpenSearchProvisioner extends RecipeProvisioner {
  readonly kind = "opensearch" as const;
  readonly services = ["opensearch", "opensearch-dashboards"] as const;

  private readonly adminPassword: string;
  private readonly majorLine: string;

  constructor(host: ContainerHost, options: OpenSearchOptions) {
    super(host);
    this.adminPassword = options.adminPassword;
    this.majorLine = options.majorLine ?? "2.x";
  }

  endpoints(address: string): EngineEndpoint[] {
    return [
      { name: "https", url: `https://${address}:${OPENSEARCH_PORT}` },
      { name: "dashboards", url: `http://${address}:${DASHBOARDS_PORT}` },
    ];
  }

  protected recipe(): RecipeStep[] {
    return [...this.enginePhase(), ...this.dashboardsPhase()];
  }

  private enginePhase(): RecipeStep[] {
    return [
      aptUpdate(),
      aptInstall(["lsb-release", "ca-certificates", "curl", "gnupg2"]),
      {
        kind: "fetch",
        name: "import opensearch signing key",
        url: KEY_URL,
        argv: ["bash", "-c", `set -o pipefail; curl -fsSL ${KEY_URL} | gpg --dearmor --batch --yes -o ${KEYRING}`],
      },
      {
        kind: "write",
        name: "register opensearch repository",
        path: `/etc/apt/sources.list.d/opensearch-${this.majorLine}.list`,
        content: aptSourceLine("opensearch", this.majorLine),
      },
      aptUpdate(),
      aptInstall(["opensearch"], { OPENSEARCH_INITIAL_ADMIN_PASSWORD: this.adminPassword }),
      {
        kind: "patch",
        name: "configure opensearch",
        path: ENGINE_CONFIG,
        ops: [
          replaceLine("#cluster.name: my-application", "cluster.name: my-application"),
          replaceLine("#network.host: 192.168.0.1", "network.host: 0.0.0.0"),
          // Default discovery expects a multi-node cluster.
          insertAfter("network.host: 0.0.0.0", "discovery.type: single-node"),
        ],
      },
      systemctl("enable", ["opensearch"]),
      systemctl("restart", ["opensearch"]),
    ];
  }

  private dashboardsPhase(): RecipeStep[] {
    return [
      {
        kind: "write",
        name: "register opensearch-dashboards repository",
        path: `/etc/apt/sources.list.d/opensearch-dashboards-${this.majorLine}.list`,
        content: aptSourceLine("opensearch-dashboards", this.majorLine),
      },
      aptUpdate(),
      aptInstall(["opensearch-dashboards"]),
      {
        kind: "patch",
        name: "configure opensearch-dashboards",
        path: DASHBOARDS_CONFIG,
        ops: [replaceLine('# server.host: "localhost"', "server.host: 0.0.0.0")],
      },
      systemctl("enable", ["opensearch-dashboards"]),
      systemctl("restart", ["opensearch-dashboards"]),
    ];
  }
}
