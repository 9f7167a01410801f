import { logger } from "../config/logger.js";
import { errorMessage, FetchError, HostUnavailableError, ProvisionStepError } from "../host/errors.js";
import type { ContainerHost } from "../host/lxc-host.js";
import { applyPatches, type ConfigPatchWarning, expectedText, type PatchOp } from "./config-patch.js";
import { renderUnit, type ServiceUnit, unitPath } from "./systemd-unit.js";
import type { EngineEndpoint, EngineKind, EngineProvisioner, ProvisionOutcome } from "./types.js";

export interface StepContext {
  host: ContainerHost;
  container: string;
}

/**
 * One provisioning step. `unless` is a probe command run inside the
 * container first; exit 0 means the step's effect is already in place and
 * the step is skipped, which is what makes a re-run after a partial failure
 * safe.
 */
export type RecipeStep =
  | { kind: "run"; name: string; argv: string[]; env?: Record<string, string>; unless?: string[] }
  | { kind: "fetch"; name: string; url: string; argv: string[]; unless?: string[] }
  | { kind: "write"; name: string; path: string; content: string }
  | { kind: "patch"; name: string; path: string | ((ctx: StepContext) => Promise<string>); ops: PatchOp[] };

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

// ---------------------------------------------------------------------------
// Step builders shared by every engine
// ---------------------------------------------------------------------------

export function aptUpdate(): RecipeStep {
  return { kind: "run", name: "update package index", argv: ["apt-get", "update"], env: APT_ENV };
}

export function aptInstall(packages: string[], env: Record<string, string> = {}): RecipeStep {
  return {
    kind: "run",
    name: `install ${packages.join(" ")}`,
    argv: ["apt-get", "install", "-y", ...packages],
    env: { ...APT_ENV, ...env },
  };
}

/** `curl -f` exits non-zero on HTTP errors as well as on unreachable hosts. */
export function download(url: string, dest: string, unless?: string[]): RecipeStep {
  return { kind: "fetch", name: `download ${url}`, url, argv: ["curl", "-fsSL", url, "-o", dest], unless };
}

/** Unprivileged system account with no login shell, home at the data root. */
export function serviceAccount(user: string, home: string): RecipeStep {
  return {
    kind: "run",
    name: `create service account ${user}`,
    argv: ["useradd", "-d", home, "-s", "/bin/false", "-m", "-r", user],
    unless: ["id", "-u", user],
  };
}

/** Data directories owned by the service account, closed to everyone else. */
export function dataTree(user: string, root: string, subdirs: string[]): RecipeStep[] {
  const dirs = subdirs.length > 0 ? subdirs.map((d) => `${root}/${d}`) : [root];
  return [
    { kind: "run", name: "create data directories", argv: ["mkdir", "-p", ...dirs] },
    { kind: "run", name: "set data ownership", argv: ["chown", "-R", `${user}:${user}`, root] },
    { kind: "run", name: "restrict data permissions", argv: ["chmod", "750", root] },
  ];
}

export function installUnit(service: string, unit: ServiceUnit): RecipeStep[] {
  return [
    { kind: "write", name: `install ${service} unit`, path: unitPath(service), content: renderUnit(unit) },
    { kind: "run", name: "reload systemd", argv: ["systemctl", "daemon-reload"] },
  ];
}

export function systemctl(action: "enable" | "start" | "restart", services: readonly string[]): RecipeStep {
  return { kind: "run", name: `${action} ${services.join(" ")}`, argv: ["systemctl", action, ...services] };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Execute a recipe in order, stopping at the first failing step. Nothing is
 * rolled back; the next run re-enters the recipe and the probes skip what
 * already happened.
 */
export async function runRecipe(
  host: ContainerHost,
  engine: EngineKind,
  container: string,
  steps: readonly RecipeStep[],
  signal?: AbortSignal,
): Promise<ProvisionOutcome> {
  const ctx: StepContext = { host, container };
  const outcome: ProvisionOutcome = { steps: [], warnings: [] };

  for (const step of steps) {
    signal?.throwIfAborted();

    if ((step.kind === "run" || step.kind === "fetch") && step.unless) {
      const probe = await host.exec(container, step.unless);
      if (probe.exitCode === 0) {
        logger.debug(`[${engine}] ${step.name}: already done`);
        continue;
      }
    }

    logger.info(`[${engine}] ${step.name}`, { container });
    try {
      await runStep(ctx, engine, step, outcome.warnings);
    } catch (err) {
      if (err instanceof FetchError || err instanceof ProvisionStepError || err instanceof HostUnavailableError) {
        throw err;
      }
      throw new ProvisionStepError(engine, step.name, 1, errorMessage(err));
    }
    outcome.steps.push(step.name);
  }

  return outcome;
}

async function runStep(
  ctx: StepContext,
  engine: EngineKind,
  step: RecipeStep,
  warnings: ConfigPatchWarning[],
): Promise<void> {
  switch (step.kind) {
    case "run": {
      const res = await ctx.host.exec(ctx.container, step.argv, { env: step.env });
      if (res.exitCode !== 0) {
        throw new ProvisionStepError(engine, step.name, res.exitCode, tail(res.stderr || res.stdout));
      }
      return;
    }
    case "fetch": {
      const res = await ctx.host.exec(ctx.container, step.argv);
      if (res.exitCode !== 0) {
        throw new FetchError(step.url, res.exitCode, tail(res.stderr));
      }
      return;
    }
    case "write":
      await ctx.host.writeFile(ctx.container, step.path, step.content);
      return;
    case "patch": {
      const path = typeof step.path === "string" ? step.path : await step.path(ctx);
      const original = await ctx.host.readFile(ctx.container, path);
      const report = applyPatches(original, step.ops);

      for (const { op, result } of report.results) {
        if (result !== "no-match") continue;
        const warning: ConfigPatchWarning = { kind: "ConfigPatchNoOp", path, expected: expectedText(op) };
        logger.warn(`[${engine}] ${path}: expected default line not found, override not applied`, {
          expected: warning.expected,
        });
        warnings.push(warning);
      }

      if (report.changed) {
        await ctx.host.writeFile(ctx.container, path, report.content);
      }
      return;
    }
  }
}

/** Last non-empty line of command output, for error messages. */
function tail(output: string): string {
  const lines = output.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}

// ---------------------------------------------------------------------------
// Base provisioner
// ---------------------------------------------------------------------------

/**
 * Shared shape of all engine provisioners: the activity check and recipe
 * execution live here, engines supply only their steps and endpoints.
 */
export abstract class RecipeProvisioner implements EngineProvisioner {
  abstract readonly kind: EngineKind;
  abstract readonly services: readonly string[];

  constructor(protected readonly host: ContainerHost) {}

  get defaultContainer(): string {
    return this.kind;
  }

  /** Active only when every unit reports "active"; query errors count as inactive. */
  async isActive(container: string): Promise<boolean> {
    for (const service of this.services) {
      const state = await this.host.serviceState(container, service);
      if (state !== "active") return false;
    }
    return true;
  }

  provision(container: string, signal?: AbortSignal): Promise<ProvisionOutcome> {
    return runRecipe(this.host, this.kind, container, this.recipe(container), signal);
  }

  abstract endpoints(address: string): EngineEndpoint[];

  protected abstract recipe(container: string): RecipeStep[];
}
