import { describe, expect, it, vi } from "vitest";
import { FakeLxd } from "../../tests/support/fake-lxd.js";
import { type CommandResult, type CommandRunner } from "./command-runner.js";
import { ContainerLaunchError, HostUnavailableError } from "./errors.js";
import { LxcHost } from "./lxc-host.js";

function makeRunner(result: Partial<CommandResult> = {}) {
  const run = vi.fn<CommandRunner["run"]>().mockResolvedValue({ exitCode: 0, stdout: "", stderr: "", ...result });
  return { run };
}

describe("LxcHost", () => {
  describe("info", () => {
    it("throws HostUnavailableError when the lxc binary is missing", async () => {
      const host = new LxcHost(new FakeLxd({ missingBinary: true }));
      await expect(host.info()).rejects.toThrow(HostUnavailableError);
      await expect(host.info()).rejects.toThrow("Container host unavailable: lxc not found; install LXD and try again");
    });

    it("throws HostUnavailableError when the daemon refuses the request", async () => {
      const host = new LxcHost(new FakeLxd({ unavailable: true }));
      await expect(host.info()).rejects.toThrow(/permission denied/);
    });

    it("uses the configured binary name", async () => {
      const runner = makeRunner();
      await new LxcHost(runner, "/snap/bin/lxc").info();
      expect(runner.run).toHaveBeenCalledWith("/snap/bin/lxc", ["info"], undefined);
    });
  });

  describe("profileExists", () => {
    it("returns false for 'Profile not found'", async () => {
      const host = new LxcHost(new FakeLxd());
      await expect(host.profileExists("test-env")).resolves.toBe(false);
    });

    it("treats any other failure as an unavailable host", async () => {
      const host = new LxcHost(makeRunner({ exitCode: 1, stderr: "Error: not authorized\n" }));
      await expect(host.profileExists("test-env")).rejects.toThrow(HostUnavailableError);
    });
  });

  describe("launch", () => {
    it("passes the image, name and each profile in order", async () => {
      const runner = makeRunner();
      await new LxcHost(runner).launch("solr", "ubuntu:24.04", ["default", "test-env"]);
      expect(runner.run).toHaveBeenCalledWith(
        "lxc",
        ["launch", "ubuntu:24.04", "solr", "--profile", "default", "--profile", "test-env"],
        undefined,
      );
    });

    it("throws ContainerLaunchError naming the container", async () => {
      const host = new LxcHost(new FakeLxd({ failingLaunches: ["solr"] }));
      const err = await host.launch("solr", "ubuntu:99.99", ["default"]).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ContainerLaunchError);
      expect(err).toHaveProperty("container", "solr");
    });
  });

  describe("exec", () => {
    it("places --env flags before the -- separator", async () => {
      const runner = makeRunner();
      await new LxcHost(runner).exec("opensearch", ["apt-get", "install", "-y", "opensearch"], {
        env: { OPENSEARCH_INITIAL_ADMIN_PASSWORD: "test-secret" },
      });
      expect(runner.run).toHaveBeenCalledWith(
        "lxc",
        [
          "exec",
          "opensearch",
          "--env",
          "OPENSEARCH_INITIAL_ADMIN_PASSWORD=test-secret",
          "--",
          "apt-get",
          "install",
          "-y",
          "opensearch",
        ],
        { input: undefined },
      );
    });

    it("resolves with the exit code instead of throwing", async () => {
      const host = new LxcHost(makeRunner({ exitCode: 3, stdout: "inactive\n" }));
      await expect(host.exec("solr", ["systemctl", "is-active", "solr"])).resolves.toEqual({
        exitCode: 3,
        stdout: "inactive\n",
        stderr: "",
      });
    });
  });

  describe("serviceState", () => {
    it("returns the trimmed state word", async () => {
      const host = new LxcHost(makeRunner({ exitCode: 3, stdout: "inactive\n" }));
      await expect(host.serviceState("solr", "solr")).resolves.toBe("inactive");
    });

    it("returns unknown when the query cannot run", async () => {
      const host = new LxcHost(new FakeLxd({ missingBinary: true }));
      await expect(host.serviceState("solr", "solr")).resolves.toBe("unknown");
    });
  });

  describe("files", () => {
    it("writes through tee and reads back through cat", async () => {
      const lxd = new FakeLxd();
      lxd.addContainer("quickwit");
      const host = new LxcHost(lxd);

      await host.writeFile("quickwit", "/etc/hello.conf", "a = 1\n");

      await expect(host.readFile("quickwit", "/etc/hello.conf")).resolves.toBe("a = 1\n");
      await expect(host.readFile("quickwit", "/etc/missing.conf")).rejects.toThrow(
        "Cannot read /etc/missing.conf in quickwit: cat: /etc/missing.conf: No such file or directory",
      );
    });
  });

  describe("ipv4Address", () => {
    it("returns the global inet address of eth0", async () => {
      const lxd = new FakeLxd();
      lxd.addContainer("meilisearch");
      await expect(new LxcHost(lxd).ipv4Address("meilisearch")).resolves.toBe("10.20.30.10");
    });

    it("returns null for a stopped container", async () => {
      const lxd = new FakeLxd();
      lxd.addContainer("meilisearch", "Stopped");
      await expect(new LxcHost(lxd).ipv4Address("meilisearch")).resolves.toBeNull();
    });
  });

  describe("listContainers", () => {
    it("rejects output that is not JSON", async () => {
      const host = new LxcHost(makeRunner({ stdout: "+------+\n| NAME |\n" }));
      await expect(host.listContainers()).rejects.toThrow("lxc list returned malformed JSON");
    });
  });
});
