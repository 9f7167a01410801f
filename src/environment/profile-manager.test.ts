import { beforeEach, describe, expect, it } from "vitest";
import { parse as parseYaml } from "yaml";
import { FakeLxd } from "../../tests/support/fake-lxd.js";
import { HostUnavailableError } from "../host/errors.js";
import { LxcHost } from "../host/lxc-host.js";
import { ProfileManager } from "./profile-manager.js";
import type { ResourceProfileSpec } from "./profile-schema.js";

const PROFILE: ResourceProfileSpec = {
  name: "test-env",
  cpuLimit: 2,
  memLimit: "4GB",
  disk: { path: "/", pool: "default", type: "disk" },
  description: "Test environment for search engine performance testing",
};

describe("ProfileManager", () => {
  let lxd: FakeLxd;
  let manager: ProfileManager;

  beforeEach(() => {
    lxd = new FakeLxd();
    manager = new ProfileManager(new LxcHost(lxd));
  });

  it("creates the profile and applies the whole document in one edit", async () => {
    await expect(manager.ensureProfile(PROFILE)).resolves.toBe("created");

    expect(lxd.mutations).toEqual(["profile create test-env", "profile edit test-env"]);
    expect(parseYaml(lxd.profiles.get("test-env") ?? "")).toEqual({
      config: { "limits.cpu": "2", "limits.memory": "4GB" },
      description: "Test environment for search engine performance testing",
      devices: { root: { path: "/", pool: "default", type: "disk" } },
    });
  });

  it("performs zero mutations when called again with the same arguments", async () => {
    await manager.ensureProfile(PROFILE);
    const before = [...lxd.mutations];

    await expect(manager.ensureProfile(PROFILE)).resolves.toBe("existing");

    expect(lxd.mutations).toEqual(before);
    expect(lxd.profiles.size).toBe(1);
  });

  it("never edits a profile that already exists", async () => {
    lxd.profiles.set("test-env", "config:\n  limits.cpu: \"8\"\n");

    await manager.ensureProfile(PROFILE);

    expect(lxd.mutations).toEqual([]);
    expect(lxd.profiles.get("test-env")).toBe("config:\n  limits.cpu: \"8\"\n");
  });

  it("creates only one profile when two callers race", async () => {
    const results = await Promise.all([manager.ensureProfile(PROFILE), manager.ensureProfile(PROFILE)]);

    expect(results.sort()).toEqual(["created", "existing"]);
    expect(lxd.mutations.filter((m) => m.startsWith("profile create"))).toHaveLength(1);
  });

  it("rejects an invalid memory limit before touching the host", async () => {
    await expect(manager.ensureProfile({ ...PROFILE, memLimit: "lots" })).rejects.toThrow(
      /Invalid resource profile "test-env"/,
    );
    expect(lxd.mutations).toEqual([]);
  });

  it("propagates HostUnavailableError", async () => {
    const unavailable = new ProfileManager(new LxcHost(new FakeLxd({ unavailable: true })));
    await expect(unavailable.ensureProfile(PROFILE)).rejects.toThrow(HostUnavailableError);
  });
});
