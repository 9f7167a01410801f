#!/usr/bin/env node

/**
 * search-envs
 *
 * Provision LXD containers running the search engines under benchmark.
 */

import { realpathSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { type Config, config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { ENGINE_KINDS, type EngineKind, engineKindSchema } from "./engines/types.js";
import { errorMessage, isFatal } from "./host/errors.js";
import { resolveEndpoints } from "./orchestrator/endpoints.js";
import { formatSummary } from "./orchestrator/report.js";
import { createEnvironment, type Environment } from "./orchestrator/services.js";

export const EXIT_OK = 0;
export const EXIT_ENGINE_FAILED = 1;
export const EXIT_HOST_UNAVAILABLE = 2;

export interface CliDeps {
  config: Config;
  environment: Environment;
  /** Receives command output (summary, status table, JSON). */
  out: (text: string) => void;
  /** Aborts an in-flight `up` between steps. */
  signal?: AbortSignal;
}

function collectEngine(value: string, previous: EngineKind[]): EngineKind[] {
  const parsed = engineKindSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`unknown engine "${value}" (expected one of ${ENGINE_KINDS.join(", ")})`);
  }
  return [...previous, parsed.data];
}

function selection(engines: EngineKind[], cfg: Config): EngineKind[] {
  return engines.length > 0 ? engines : cfg.engines;
}

/** Parse argv, run the chosen command and return the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { environment, out } = deps;
  let exitCode = EXIT_OK;

  const program = new Command();
  program
    .name("search-envs")
    .description("Provision isolated LXD environments for search engine benchmarks")
    .exitOverride()
    .configureOutput({ writeOut: (s) => out(s.trimEnd()) });

  const engineArg = (cmd: Command) =>
    cmd.argument("[engines...]", `engines to act on (${ENGINE_KINDS.join(", ")})`, collectEngine, []);

  engineArg(program.command("up").description("ensure profile, containers and engine services")).action(
    async (engines: EngineKind[]) => {
      const report = await environment.driver.run(selection(engines, deps.config), deps.signal);
      out(formatSummary(report));
      exitCode = report.ok ? EXIT_OK : EXIT_ENGINE_FAILED;
    },
  );

  engineArg(program.command("status").description("show whether each engine's service is active")).action(
    async (engines: EngineKind[]) => {
      await environment.host.info();
      for (const engine of selection(engines, deps.config)) {
        const provisioner = environment.provisioners[engine];
        const active = await provisioner.isActive(provisioner.defaultContainer);
        out(`${engine} (${provisioner.defaultContainer}): ${active ? "active" : "inactive"}`);
      }
    },
  );

  engineArg(program.command("endpoints").description("print engine URLs as JSON"))
    .option("-o, --out <file>", "write the JSON to a file instead of stdout")
    .action(async (engines: EngineKind[], opts: { out?: string }) => {
      const manifest = await resolveEndpoints(
        environment.host,
        environment.provisioners,
        selection(engines, deps.config),
      );
      const json = `${JSON.stringify(manifest, null, 2)}\n`;
      if (opts.out) {
        await writeFile(opts.out, json, "utf8");
        out(`Wrote ${manifest.length} engine endpoint(s) to ${opts.out}`);
      } else {
        out(json.trimEnd());
      }
    });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (isFatal(err)) {
      logger.error(err.message);
      out(err.message);
      return EXIT_HOST_UNAVAILABLE;
    }
    throw err;
  }
  return exitCode;
}

async function main(): Promise<void> {
  process.on("unhandledRejection", (reason: unknown) => {
    logger.error("Unhandled promise rejection", { reason: errorMessage(reason) });
  });
  process.on("uncaughtException", (err: Error) => {
    logger.error("Uncaught exception", { error: err.message, stack: err.stack });
    process.exit(1);
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("interrupted")));

  process.exitCode = await runCli(process.argv, {
    config,
    environment: createEnvironment(config),
    signal: controller.signal,
    out: (text) => process.stdout.write(`${text}\n`),
  });
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main().catch((err: unknown) => {
    logger.error("search-envs failed", { error: errorMessage(err) });
    process.exitCode = 1;
  });
}
