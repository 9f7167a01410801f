import type { ContainerHost } from "../host/lxc-host.js";
import { replaceLine } from "./config-patch.js";
import { aptInstall, aptUpdate, download, RecipeProvisioner, type RecipeStep, systemctl } from "./recipe.js";
import type { EngineEndpoint } from "./types.js";

export const SOLR_PORT = 8983;

const INSTALL_DIR = "/opt/solr";
const DEFAULTS_FILE = "/etc/default/solr.in.sh";

export interface SolrOptions {
  version: string;
  /** Name of the core created after install. */
  core: string;
  mirror?: string;
}

/**
 * Apache Solr via the vendor's service installer. The only engine that
 * also creates an index (a core) as part of provisioning.
 */
export class SolrProvisioner extends RecipeProvisioner {
  readonly kind = "solr" as const;
  readonly services = ["solr"] as const;

  private readonly version: string;
  private readonly core: string;
  private readonly mirror: string;

  constructor(host: ContainerHost, options: SolrOptions) {
    super(host);
    this.version = options.version;
    this.core = options.core;
    this.mirror = options.mirror ?? "https://dlcdn.apache.org/solr/solr";
  }

  endpoints(address: string): EngineEndpoint[] {
    return [{ name: "http", url: `http://${address}:${SOLR_PORT}/solr/${this.core}` }];
  }

  protected recipe(container: string): RecipeStep[] {
    const release = `solr-${this.version}`;
    const archive = `${release}.tgz`;
    const installed = ["test", "-d", INSTALL_DIR];

    return [
      aptUpdate(),
      aptInstall(["openjdk-21-jre-headless"]),
      download(`${this.mirror}/${this.version}/${archive}`, archive, installed),
      {
        kind: "run",
        name: "extract solr service installer",
        argv: ["tar", "xzf", archive, `${release}/bin/install_solr_service.sh`, "--strip-components=2"],
        unless: installed,
      },
      {
        kind: "run",
        name: "run solr service installer",
        argv: ["bash", "./install_solr_service.sh", archive],
        unless: installed,
      },
      {
        kind: "patch",
        name: "configure solr host binding",
        path: DEFAULTS_FILE,
        ops: [
          replaceLine('#SOLR_HOST="192.168.1.1"', `SOLR_HOST="${container}.lxd"`),
          replaceLine('#SOLR_JETTY_HOST="127.0.0.1"', 'SOLR_JETTY_HOST="0.0.0.0"'),
        ],
      },
      systemctl("enable", this.services),
      systemctl("restart", this.services),
      {
        kind: "run",
        name: "wait for solr api",
        argv: [
          "curl",
          "-fsS",
          "-o",
          "/dev/null",
          "--retry",
          "60",
          "--retry-delay",
          "1",
          "--retry-connrefused",
          `http://localhost:${SOLR_PORT}/solr/admin/info/system`,
        ],
      },
      {
        kind: "run",
        name: `create core ${this.core}`,
        argv: ["sudo", "-u", "solr", `${INSTALL_DIR}/bin/solr`, "create", "-c", this.core],
        unless: ["test", "-d", `/var/solr/data/${this.core}`],
      },
    ];
  }
}
