import { beforeEach, describe, expect, it } from "vitest";
import { FakeLxd } from "../../tests/support/fake-lxd.js";
import { LxcHost } from "../host/lxc-host.js";
import { MeilisearchProvisioner } from "./meilisearch.js";

describe("MeilisearchProvisioner", () => {
  let lxd: FakeLxd;
  let provisioner: MeilisearchProvisioner;

  beforeEach(() => {
    lxd = new FakeLxd();
    lxd.addContainer("meilisearch");
    provisioner = new MeilisearchProvisioner(new LxcHost(lxd));
  });

  it("installs the binary and starts the service", async () => {
    await expect(provisioner.isActive("meilisearch")).resolves.toBe(false);

    const outcome = await provisioner.provision("meilisearch");

    expect(outcome.warnings).toEqual([]);
    await expect(provisioner.isActive("meilisearch")).resolves.toBe(true);
    const c = lxd.container("meilisearch");
    expect(c.files.has("/usr/local/bin/meilisearch")).toBe(true);
    expect(c.users.has("meilisearch")).toBe(true);
    expect(c.dirs.has("/var/lib/meilisearch/data")).toBe(true);
  });

  it("binds to all interfaces and keeps data under the service home", async () => {
    await provisioner.provision("meilisearch");

    const lines = (lxd.container("meilisearch").files.get("/etc/meilisearch.toml") ?? "").split("\n");
    expect(lines).toContain('http_addr = "0.0.0.0:7700"');
    expect(lines).toContain('db_path = "/var/lib/meilisearch/data"');
    expect(lines).toContain('dump_dir = "/var/lib/meilisearch/dumps"');
    expect(lines).toContain('snapshot_dir = "/var/lib/meilisearch/snapshots"');
  });

  it("installs a unit pointing at the patched config", async () => {
    await provisioner.provision("meilisearch");

    const unit = lxd.container("meilisearch").files.get("/etc/systemd/system/meilisearch.service") ?? "";
    expect(unit.split("\n")).toContain("ExecStart=/usr/local/bin/meilisearch --config-file-path /etc/meilisearch.toml");
    expect(unit.split("\n")).toContain("User=meilisearch");
  });

  it("skips download and install steps on a second run", async () => {
    await provisioner.provision("meilisearch");
    const config = lxd.container("meilisearch").files.get("/etc/meilisearch.toml");

    const again = await provisioner.provision("meilisearch");

    expect(again.steps).toEqual([
      "update package index",
      "chown meilisearch binary",
      "create data directories",
      "set data ownership",
      "restrict data permissions",
      "configure meilisearch",
      "install meilisearch unit",
      "reload systemd",
      "enable meilisearch",
      "start meilisearch",
    ]);
    expect(again.warnings).toEqual([]);
    expect(lxd.container("meilisearch").files.get("/etc/meilisearch.toml")).toBe(config);
  });

  it("advertises the HTTP endpoint on port 7700", () => {
    expect(provisioner.endpoints("10.1.2.3")).toEqual([{ name: "http", url: "http://10.1.2.3:7700" }]);
  });
});
