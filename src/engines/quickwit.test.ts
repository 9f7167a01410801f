import { beforeEach, describe, expect, it } from "vitest";
import { FakeLxd, QUICKWIT_RELEASE } from "../../tests/support/fake-lxd.js";
import { LxcHost } from "../host/lxc-host.js";
import { locateReleaseDir, QuickwitProvisioner } from "./quickwit.js";

describe("QuickwitProvisioner", () => {
  let lxd: FakeLxd;
  let host: LxcHost;
  let provisioner: QuickwitProvisioner;

  beforeEach(() => {
    lxd = new FakeLxd();
    lxd.addContainer("quickwit");
    host = new LxcHost(lxd);
    provisioner = new QuickwitProvisioner(host);
  });

  it("patches the config inside the versioned release directory", async () => {
    const outcome = await provisioner.provision("quickwit");

    expect(outcome.warnings).toEqual([]);
    const lines = (lxd.container("quickwit").files.get(`${QUICKWIT_RELEASE}/config/quickwit.yaml`) ?? "").split("\n");
    expect(lines).toContain("listen_address: 0.0.0.0");
    expect(lines).toContain("data_dir: /var/lib/quickwit/data");
  });

  it("starts the service through a unit that resolves the release at start time", async () => {
    await provisioner.provision("quickwit");

    const unit = lxd.container("quickwit").files.get("/etc/systemd/system/quickwit.service") ?? "";
    expect(unit.split("\n")).toContain(
      'ExecStart=/bin/bash -c "exec /usr/local/bin/quickwit-v*/quickwit run --config /usr/local/bin/quickwit-v*/config/quickwit.yaml"',
    );
    await expect(provisioner.isActive("quickwit")).resolves.toBe(true);
  });

  it("skips the installer once a release is in place", async () => {
    await provisioner.provision("quickwit");

    const again = await provisioner.provision("quickwit");

    expect(again.steps).not.toContain("run quickwit installer");
    expect(again.steps).not.toContain("install quickwit release");
    expect(again.steps).toContain("configure quickwit");
  });

  describe("locateReleaseDir", () => {
    it("returns the newest release directory", async () => {
      lxd.container("quickwit").dirs.add(QUICKWIT_RELEASE);
      await expect(locateReleaseDir({ host, container: "quickwit" })).resolves.toBe(QUICKWIT_RELEASE);
    });

    it("throws when nothing is installed", async () => {
      await expect(locateReleaseDir({ host, container: "quickwit" })).rejects.toThrow(
        "No quickwit release directory matching /usr/local/bin/quickwit-v* in quickwit",
      );
    });
  });

  it("advertises the HTTP endpoint on port 7280", () => {
    expect(provisioner.endpoints("10.1.2.3")).toEqual([{ name: "http", url: "http://10.1.2.3:7280" }]);
  });
});
