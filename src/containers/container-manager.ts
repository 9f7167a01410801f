import { setTimeout as delay } from "node:timers/promises";
import { logger } from "../config/logger.js";
import { BootTimeoutError, ContainerLaunchError, errorMessage, isFatal } from "../host/errors.js";
import { KeyedMutex } from "../host/keyed-mutex.js";
import type { ContainerHost, ContainerInfo } from "../host/lxc-host.js";

export type ContainerStatus = "created" | "started" | "existing" | "failed";

export interface ContainerOutcome {
  name: string;
  status: ContainerStatus;
  error?: Error;
}

export interface ContainerManagerOptions {
  bootTimeoutMs: number;
  bootPollIntervalMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

/** `systemctl is-system-running` states that mean the init system has settled. */
const BOOTED_STATES = new Set(["running", "degraded"]);

/**
 * Ensures one booted container per logical engine name.
 *
 * Existing containers are reused as-is (started first if stopped); missing
 * ones are launched from the base image and polled until their init system
 * is up. Never deletes anything.
 */
export class ContainerManager {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly host: ContainerHost,
    private readonly options: ContainerManagerOptions,
    private readonly locks = new KeyedMutex(),
  ) {
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
    this.now = options.now ?? Date.now;
  }

  /**
   * Launch failures and boot timeouts are recorded per container and the
   * remaining names are still processed. HostUnavailableError propagates.
   */
  async ensureContainers(
    names: Iterable<string>,
    baseImage: string,
    profiles: readonly string[],
    signal?: AbortSignal,
  ): Promise<ContainerOutcome[]> {
    const outcomes: ContainerOutcome[] = [];
    for (const name of new Set(names)) {
      signal?.throwIfAborted();
      try {
        const status = await this.locks.withLock(`container:${name}`, () =>
          this.ensureOne(name, baseImage, profiles, signal),
        );
        outcomes.push({ name, status });
      } catch (err) {
        if (isFatal(err) || signal?.aborted) throw err;
        const error = err instanceof Error ? err : new ContainerLaunchError(name, errorMessage(err));
        logger.error(`Container '${name}' could not be prepared`, { error: error.message });
        outcomes.push({ name, status: "failed", error });
      }
    }
    return outcomes;
  }

  /** Poll the container's init system until it reports a settled state. */
  async waitForBoot(name: string, signal?: AbortSignal): Promise<void> {
    const deadline = this.now() + this.options.bootTimeoutMs;
    let lastState = "unknown";

    for (;;) {
      signal?.throwIfAborted();
      const res = await this.host.exec(name, ["systemctl", "is-system-running"]);
      lastState = res.stdout.trim() || lastState;
      if (BOOTED_STATES.has(lastState)) {
        logger.debug(`Container '${name}' booted`, { state: lastState });
        return;
      }
      if (this.now() >= deadline) {
        throw new BootTimeoutError(name, this.options.bootTimeoutMs, lastState);
      }
      await this.sleep(this.options.bootPollIntervalMs, signal);
    }
  }

  private async ensureOne(
    name: string,
    baseImage: string,
    profiles: readonly string[],
    signal?: AbortSignal,
  ): Promise<ContainerStatus> {
    const existing = findContainer(await this.host.listContainers(), name);

    if (existing && existing.status.toLowerCase() === "running") {
      logger.info(`Container '${name}' already exists. Skipping creation.`);
      return "existing";
    }

    if (existing) {
      logger.info(`Container '${name}' exists but is ${existing.status.toLowerCase()}, starting...`);
      await this.host.start(name);
      await this.waitForBoot(name, signal);
      return "started";
    }

    logger.info(`Launching container '${name}'...`, { image: baseImage, profiles });
    await this.host.launch(name, baseImage, profiles);
    await this.waitForBoot(name, signal);
    return "created";
  }
}

/** Exact name match; a container called "solr-old" is not "solr". */
function findContainer(containers: ContainerInfo[], name: string): ContainerInfo | undefined {
  return containers.find((c) => c.name === name);
}
