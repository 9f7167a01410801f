import { z } from "zod";
import { ENGINE_KINDS, type EngineKind, engineKindSchema } from "../engines/types.js";

/**
 * Parse a comma-separated list of engine kinds into EngineKind[].
 * Example: "meilisearch,solr"
 */
export function parseEngineList(raw: string | undefined): EngineKind[] {
  if (!raw) return [...ENGINE_KINDS];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((name) => {
      const parsed = engineKindSchema.safeParse(name);
      if (!parsed.success) {
        throw new Error(`Invalid SEARCH_ENGINES entry "${name}": expected one of ${ENGINE_KINDS.join(", ")}`);
      }
      return parsed.data;
    });
}

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Path or name of the LXD client binary. */
  lxcBin: z.string().min(1).default("lxc"),
  /** Image every engine container is launched from. */
  baseImage: z.string().min(1).default("ubuntu:24.04"),
  /** Engines provisioned when none are named on the command line. */
  engines: z.array(engineKindSchema).min(1).default([...ENGINE_KINDS]),

  /** Shared resource profile applied to every container after `default`. */
  profile: z
    .object({
      name: z.string().min(1).default("test-env"),
      cpu: z.coerce.number().int().positive().default(2),
      memory: z.string().min(1).default("4GB"),
      diskPool: z.string().min(1).default("default"),
      description: z.string().default("Test environment for search engine performance testing"),
    })
    .default({
      name: "test-env",
      cpu: 2,
      memory: "4GB",
      diskPool: "default",
      description: "Test environment for search engine performance testing",
    }),

  /** Container boot wait and command limits. */
  bootTimeoutMs: z.coerce.number().int().min(1000).default(120_000),
  bootPollIntervalMs: z.coerce.number().int().min(100).default(1_000),
  commandTimeoutMs: z.coerce.number().int().min(1000).default(1_800_000),
  /** How many engines are provisioned at once. */
  concurrency: z.coerce.number().int().min(1).max(4).default(1),

  opensearch: z
    .object({
      /** Test-only admin password handed to the package installer. */
      adminPassword: z.string().min(8).default("Bench-Test-Only-1!"),
      majorLine: z.string().default("2.x"),
    })
    .default({ adminPassword: "Bench-Test-Only-1!", majorLine: "2.x" }),

  solr: z
    .object({
      version: z
        .string()
        .regex(/^\d+\.\d+\.\d+$/)
        .default("9.8.1"),
      core: z
        .string()
        .regex(/^[\w-]+$/)
        .default("new_core"),
    })
    .default({ version: "9.8.1", core: "new_core" }),
});

export type Config = z.infer<typeof configSchema>;

/** Build the configuration from an environment map. Exported for tests. */
export function buildConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    lxcBin: env.LXC_BIN,
    baseImage: env.BASE_IMAGE,
    engines: parseEngineList(env.SEARCH_ENGINES),
    profile: {
      name: env.PROFILE_NAME,
      cpu: env.PROFILE_CPU,
      memory: env.PROFILE_MEMORY,
      diskPool: env.PROFILE_DISK_POOL,
      description: env.PROFILE_DESCRIPTION,
    },
    bootTimeoutMs: env.BOOT_TIMEOUT_MS,
    bootPollIntervalMs: env.BOOT_POLL_INTERVAL_MS,
    commandTimeoutMs: env.COMMAND_TIMEOUT_MS,
    concurrency: env.PROVISION_CONCURRENCY,
    opensearch: {
      adminPassword: env.OPENSEARCH_INITIAL_ADMIN_PASSWORD,
      majorLine: env.OPENSEARCH_MAJOR_LINE,
    },
    solr: {
      version: env.SOLR_VERSION,
      core: env.SOLR_CORE,
    },
  });
}

export const config = buildConfig(process.env);
