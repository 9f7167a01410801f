import type { Config } from "../config/index.js";
import { ContainerManager } from "../containers/container-manager.js";
import { createProvisioners, type ProvisionerRegistry } from "../engines/registry.js";
import { ProfileManager } from "../environment/profile-manager.js";
import { type CommandRunner, SpawnCommandRunner } from "../host/command-runner.js";
import { KeyedMutex } from "../host/keyed-mutex.js";
import { type ContainerHost, LxcHost } from "../host/lxc-host.js";
import { OrchestrationDriver } from "./driver.js";

export interface Environment {
  host: ContainerHost;
  provisioners: ProvisionerRegistry;
  driver: OrchestrationDriver;
}

/**
 * Wire the host, managers, provisioners and driver from configuration.
 * The profile and container managers share one lock table so that every
 * check-then-create against the host registry is serialized by name.
 */
export function createEnvironment(cfg: Config, runner?: CommandRunner): Environment {
  const host = new LxcHost(runner ?? new SpawnCommandRunner(cfg.commandTimeoutMs), cfg.lxcBin);
  const locks = new KeyedMutex();
  const profiles = new ProfileManager(host, locks);
  const containers = new ContainerManager(
    host,
    { bootTimeoutMs: cfg.bootTimeoutMs, bootPollIntervalMs: cfg.bootPollIntervalMs },
    locks,
  );
  const provisioners = createProvisioners(host, cfg);

  const driver = new OrchestrationDriver(host, profiles, containers, provisioners, {
    baseImage: cfg.baseImage,
    profile: {
      name: cfg.profile.name,
      cpuLimit: cfg.profile.cpu,
      memLimit: cfg.profile.memory,
      disk: { path: "/", pool: cfg.profile.diskPool, type: "disk" },
      description: cfg.profile.description,
    },
    concurrency: cfg.concurrency,
  });

  return { host, provisioners, driver };
}
