import pLimit from "p-limit";
import { logger } from "../config/logger.js";
import type { ContainerManager, ContainerStatus } from "../containers/container-manager.js";
import type { ConfigPatchWarning } from "../engines/config-patch.js";
import type { ProvisionerRegistry } from "../engines/registry.js";
import type { EngineKind } from "../engines/types.js";
import type { ProfileManager, ProfileOutcome } from "../environment/profile-manager.js";
import type { ResourceProfileSpec } from "../environment/profile-schema.js";
import { errorMessage, isFatal } from "../host/errors.js";
import type { ContainerHost } from "../host/lxc-host.js";

export type EngineStatus = "skipped" | "provisioned" | "failed";

export interface EngineReport {
  engine: EngineKind;
  container: string;
  status: EngineStatus;
  /** Error class name, e.g. "FetchError", when status is "failed". */
  errorKind?: string;
  error?: string;
  steps: string[];
  warnings: ConfigPatchWarning[];
}

export interface RunReport {
  profile: { name: string; outcome: ProfileOutcome };
  containers: Array<{ name: string; status: ContainerStatus; error?: string }>;
  engines: EngineReport[];
  /** True only when no engine failed. */
  ok: boolean;
}

export interface DriverOptions {
  baseImage: string;
  profile: ResourceProfileSpec;
  /** Profiles applied before the environment profile. */
  baseProfiles?: string[];
  /** Engines provisioned at the same time. */
  concurrency?: number;
}

/**
 * Sequences profile → containers → engines.
 *
 * HostUnavailableError and an aborted signal end the run. Everything else is isolated per
 * engine: a failed container or recipe is recorded and the other engines
 * carry on.
 */
export class OrchestrationDriver {
  constructor(
    private readonly host: ContainerHost,
    private readonly profiles: ProfileManager,
    private readonly containers: ContainerManager,
    private readonly provisioners: ProvisionerRegistry,
    private readonly options: DriverOptions,
  ) {}

  async run(selection: Iterable<EngineKind>, signal?: AbortSignal): Promise<RunReport> {
    const engines = [...new Set(selection)];
    if (engines.length === 0) {
      throw new Error("No engines selected");
    }

    await this.host.info();

    const profileOutcome = await this.profiles.ensureProfile(this.options.profile);

    const containerNames = engines.map((e) => this.provisioners[e].defaultContainer);
    const profileList = [...(this.options.baseProfiles ?? ["default"]), this.options.profile.name];
    const containerOutcomes = await this.containers.ensureContainers(
      containerNames,
      this.options.baseImage,
      profileList,
      signal,
    );
    const containerErrors = new Map(containerOutcomes.flatMap((c) => (c.error ? [[c.name, c.error] as const] : [])));

    const limit = pLimit(Math.max(1, this.options.concurrency ?? 1));
    // Set by the first fatal or abort error; engines still queued do not start.
    let halted: unknown;
    const reports = await Promise.all(
      engines.map((engine) =>
        limit(async () => {
          if (halted !== undefined) throw halted;
          try {
            return await this.provisionEngine(engine, containerErrors, signal);
          } catch (err) {
            halted = err;
            limit.clearQueue();
            throw err;
          }
        }),
      ),
    );

    const report: RunReport = {
      profile: { name: this.options.profile.name, outcome: profileOutcome },
      containers: containerOutcomes.map((c) => ({
        name: c.name,
        status: c.status,
        ...(c.error ? { error: c.error.message } : {}),
      })),
      engines: reports,
      ok: reports.every((r) => r.status !== "failed"),
    };

    logger.info("Provisioning run finished", {
      ok: report.ok,
      engines: Object.fromEntries(reports.map((r) => [r.engine, r.status])),
    });
    return report;
  }

  private async provisionEngine(
    engine: EngineKind,
    containerErrors: Map<string, Error>,
    signal?: AbortSignal,
  ): Promise<EngineReport> {
    const provisioner = this.provisioners[engine];
    const container = provisioner.defaultContainer;
    const base = { engine, container, steps: [], warnings: [] };

    const containerError = containerErrors.get(container);
    if (containerError) {
      return { ...base, status: "failed", errorKind: containerError.name, error: containerError.message };
    }

    try {
      signal?.throwIfAborted();
      if (await provisioner.isActive(container)) {
        logger.info(`[${engine}] service already active, skipping`);
        return { ...base, status: "skipped" };
      }

      logger.info(`Setting up ${engine} in container '${container}'...`);
      const outcome = await provisioner.provision(container, signal);

      if (!(await provisioner.isActive(container))) {
        return {
          ...base,
          ...outcome,
          status: "failed",
          errorKind: "ServiceInactive",
          error: `${provisioner.services.join(", ")} not active after provisioning`,
        };
      }
      return { ...base, ...outcome, status: "provisioned" };
    } catch (err) {
      if (isFatal(err) || signal?.aborted) throw err;
      logger.error(`[${engine}] provisioning failed`, { error: errorMessage(err) });
      return {
        ...base,
        status: "failed",
        errorKind: err instanceof Error ? err.name : "Error",
        error: errorMessage(err),
      };
    }
  }
}
