/**
 * Integration tests for a full `up` run.
 *
 * Drives the composed environment (host, managers, provisioners, driver)
 * against the in-process LXD stand-in, from an empty host to running engines.
 */
import { describe, expect, it } from "vitest";
import { buildConfig } from "../../src/config/index.js";
import { resolveEndpoints } from "../../src/orchestrator/endpoints.js";
import { formatSummary } from "../../src/orchestrator/report.js";
import { createEnvironment } from "../../src/orchestrator/services.js";
import { FakeLxd } from "../support/fake-lxd.js";

const KEY_URL = "https://artifacts.opensearch.org/publickeys/opensearch.pgp";

function environment(lxd: FakeLxd) {
  const cfg = buildConfig({ NODE_ENV: "test", OPENSEARCH_INITIAL_ADMIN_PASSWORD: "test-secret" });
  return createEnvironment(cfg, lxd);
}

describe("integration: provisioning", () => {
  it("sets up meilisearch and solr on an empty host", async () => {
    const lxd = new FakeLxd();

    const report = await environment(lxd).driver.run(["meilisearch", "solr"]);

    expect(report.ok).toBe(true);
    expect(lxd.mutations.filter((m) => m.startsWith("launch"))).toEqual(["launch meilisearch", "launch solr"]);
    expect(lxd.mutations.filter((m) => m === "profile create test-env")).toHaveLength(1);
    expect(lxd.containers.has("opensearch")).toBe(false);

    const meiliConfig = (lxd.container("meilisearch").files.get("/etc/meilisearch.toml") ?? "").split("\n");
    expect(meiliConfig).toContain('db_path = "/var/lib/meilisearch/data"');
    expect(lxd.container("meilisearch").activeUnits.has("meilisearch")).toBe(true);

    expect(lxd.container("solr").dirs.has("/var/solr/data/new_core")).toBe(true);
    expect(lxd.container("solr").activeUnits.has("solr")).toBe(true);
  });

  it("finishes a partially failed run when re-run", async () => {
    const failingUrls = [KEY_URL];
    const lxd = new FakeLxd({ failingUrls });
    const env = environment(lxd);

    const first = await env.driver.run(["opensearch", "quickwit"]);
    expect(first.ok).toBe(false);
    expect(formatSummary(first).split("\n").pop()).toBe("Setup incomplete. Failed engines: opensearch.");

    // The key server is reachable again.
    failingUrls.length = 0;
    const second = await env.driver.run(["opensearch", "quickwit"]);

    expect(second.ok).toBe(true);
    expect(second.containers.map((c) => c.status)).toEqual(["existing", "existing"]);
    expect(second.engines.map((e) => [e.engine, e.status])).toEqual([
      ["opensearch", "provisioned"],
      ["quickwit", "skipped"],
    ]);
    expect(lxd.mutations.filter((m) => m.startsWith("launch"))).toEqual(["launch opensearch", "launch quickwit"]);
  });

  it("reports where each engine can be reached once up", async () => {
    const lxd = new FakeLxd();
    const env = environment(lxd);
    await env.driver.run(["meilisearch"]);

    const manifest = await resolveEndpoints(env.host, env.provisioners, ["meilisearch"]);

    expect(manifest[0]?.endpoints).toEqual([{ name: "http", url: "http://10.20.30.10:7700" }]);
  });
});
