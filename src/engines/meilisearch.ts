import { replaceLine } from "./config-patch.js";
import {
  aptUpdate,
  dataTree,
  download,
  installUnit,
  RecipeProvisioner,
  type RecipeStep,
  serviceAccount,
  systemctl,
} from "./recipe.js";
import type { EngineEndpoint } from "./types.js";

export const MEILISEARCH_PORT = 7700;

const BIN = "/usr/local/bin/meilisearch";
const HOME = "/var/lib/meilisearch";
const CONFIG = "/etc/meilisearch.toml";
const INSTALLER_URL = "https://install.meilisearch.com";
const CONFIG_URL = "https://raw.githubusercontent.com/meilisearch/meilisearch/latest/config.toml";

/**
 * Meilisearch: a single static binary, no runtime dependency. Data, dumps
 * and snapshots all live under the service account's home.
 */
export class MeilisearchProvisioner extends RecipeProvisioner {
  readonly kind = "meilisearch" as const;
  readonly services = ["meilisearch"] as const;

  endpoints(address: string): EngineEndpoint[] {
    return [{ name: "http", url: `http://${address}:${MEILISEARCH_PORT}` }];
  }

  protected recipe(): RecipeStep[] {
    const installed = ["test", "-x", BIN];
    return [
      aptUpdate(),
      download(INSTALLER_URL, "install.sh", installed),
      { kind: "run", name: "run meilisearch installer", argv: ["bash", "install.sh"], unless: installed },
      { kind: "run", name: "install meilisearch binary", argv: ["mv", "./meilisearch", BIN], unless: installed },
      serviceAccount("meilisearch", HOME),
      { kind: "run", name: "chown meilisearch binary", argv: ["chown", "meilisearch:meilisearch", BIN] },
      ...dataTree("meilisearch", HOME, ["data", "dumps", "snapshots"]),
      download(CONFIG_URL, CONFIG, ["test", "-f", CONFIG]),
      {
        kind: "patch",
        name: "configure meilisearch",
        path: CONFIG,
        ops: [
          replaceLine(`http_addr = "localhost:${MEILISEARCH_PORT}"`, `http_addr = "0.0.0.0:${MEILISEARCH_PORT}"`),
          replaceLine(`db_path = "./data.ms"`, `db_path = "${HOME}/data"`),
          replaceLine(`dump_dir = "dumps/"`, `dump_dir = "${HOME}/dumps"`),
          replaceLine(`snapshot_dir = "snapshots/"`, `snapshot_dir = "${HOME}/snapshots"`),
        ],
      },
      ...installUnit("meilisearch", {
        description: "Meilisearch",
        workingDirectory: HOME,
        execStart: `${BIN} --config-file-path ${CONFIG}`,
        user: "meilisearch",
        group: "meilisearch",
      }),
      systemctl("enable", this.services),
      systemctl("start", this.services),
    ];
  }
}
