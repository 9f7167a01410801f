import { replaceLine } from "./config-patch.js";
import {
  aptUpdate,
  dataTree,
  download,
  installUnit,
  RecipeProvisioner,
  type RecipeStep,
  type StepContext,
  serviceAccount,
  systemctl,
} from "./recipe.js";
import type { EngineEndpoint } from "./types.js";

export const QUICKWIT_PORT = 7280;

const HOME = "/var/lib/quickwit";
const INSTALLER_URL = "https://install.quickwit.io";
/** The installer unpacks into a directory named after the release, e.g. quickwit-v0.8.2. */
const RELEASE_GLOB = "/usr/local/bin/quickwit-v*";

/**
 * Find the installed release directory. The version is only known after
 * the installer ran, so this is resolved at provisioning time.
 */
export async function locateReleaseDir(ctx: StepContext): Promise<string> {
  const res = await ctx.host.exec(ctx.container, ["bash", "-c", `ls -d ${RELEASE_GLOB} | sort -V | tail -n 1`]);
  const dir = res.stdout.trim();
  if (res.exitCode !== 0 || !dir) {
    throw new Error(`No quickwit release directory matching ${RELEASE_GLOB} in ${ctx.container}`);
  }
  return dir;
}

/** Quickwit: versioned release directory under /usr/local/bin, own service account. */
export class QuickwitProvisioner extends RecipeProvisioner {
  readonly kind = "quickwit" as const;
  readonly services = ["quickwit"] as const;

  endpoints(address: string): EngineEndpoint[] {
    return [{ name: "http", url: `http://${address}:${QUICKWIT_PORT}` }];
  }

  protected recipe(): RecipeStep[] {
    const installed = ["bash", "-c", `ls -d ${RELEASE_GLOB} >/dev/null 2>&1`];
    return [
      aptUpdate(),
      download(INSTALLER_URL, "setup.sh", installed),
      { kind: "run", name: "run quickwit installer", argv: ["bash", "setup.sh"], unless: installed },
      {
        kind: "run",
        name: "install quickwit release",
        argv: ["bash", "-c", "mv ./quickwit-v* /usr/local/bin/"],
        unless: installed,
      },
      serviceAccount("quickwit", HOME),
      { kind: "run", name: "chown quickwit release", argv: ["bash", "-c", `chown -R quickwit:quickwit ${RELEASE_GLOB}`] },
      ...dataTree("quickwit", HOME, ["data"]),
      {
        kind: "patch",
        name: "configure quickwit",
        path: async (ctx) => `${await locateReleaseDir(ctx)}/config/quickwit.yaml`,
        ops: [
          replaceLine("# listen_address: 127.0.0.1", "listen_address: 0.0.0.0"),
          replaceLine("# data_dir: /path/to/data/dir", `data_dir: ${HOME}/data`),
        ],
      },
      // The glob is expanded by bash when the unit starts, so an upgrade that
      // swaps the release directory needs no unit change.
      ...installUnit("quickwit", {
        description: "Quickwit",
        workingDirectory: HOME,
        execStart: `/bin/bash -c "exec ${RELEASE_GLOB}/quickwit run --config ${RELEASE_GLOB}/config/quickwit.yaml"`,
        user: "quickwit",
        group: "quickwit",
      }),
      systemctl("enable", this.services),
      systemctl("start", this.services),
    ];
  }
}
