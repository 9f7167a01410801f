import { stringify as stringifyYaml } from "yaml";
import { z } from "zod";

/** Disk device mounted as the container root. */
export const diskSpecSchema = z.object({
  path: z.string().min(1).default("/"),
  pool: z.string().min(1),
  type: z.literal("disk").default("disk"),
});
export type DiskSpec = z.infer<typeof diskSpecSchema>;

/** LXD memory sizes: plain bytes or a decimal/binary unit suffix. */
const MEMORY_PATTERN = /^\d+(?:[kMGTPE]B|[KMGTPE]iB|B)?$/;

/** Resource profile applied to every engine container. Validated before touching the host. */
export const resourceProfileSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[\w.-]+$/, "profile name may only contain letters, digits, '.', '_' and '-'"),
  cpuLimit: z.number().int().positive(),
  memLimit: z.string().regex(MEMORY_PATTERN, "memory limit must look like 4GB or 512MiB"),
  disk: diskSpecSchema,
  description: z.string().default(""),
});

export type ResourceProfileSpec = z.input<typeof resourceProfileSchema>;
export type ResourceProfile = z.infer<typeof resourceProfileSchema>;

/**
 * Render the full profile document passed to `lxc profile edit`.
 * The whole document is applied in one edit so a profile never exists
 * half-configured.
 */
export function renderProfileDocument(profile: ResourceProfile): string {
  return stringifyYaml({
    config: {
      "limits.cpu": String(profile.cpuLimit),
      "limits.memory": profile.memLimit,
    },
    description: profile.description,
    devices: {
      root: {
        path: profile.disk.path,
        pool: profile.disk.pool,
        type: profile.disk.type,
      },
    },
  });
}
