import { logger } from "../config/logger.js";
import { KeyedMutex } from "../host/keyed-mutex.js";
import type { ContainerHost } from "../host/lxc-host.js";
import { renderProfileDocument, type ResourceProfileSpec, resourceProfileSchema } from "./profile-schema.js";

export type ProfileOutcome = "created" | "existing";

/**
 * Ensures the shared resource profile exists on the container host.
 * Created once; an existing profile is never edited again.
 */
export class ProfileManager {
  constructor(
    private readonly host: ContainerHost,
    private readonly locks = new KeyedMutex(),
  ) {}

  async ensureProfile(requested: ResourceProfileSpec): Promise<ProfileOutcome> {
    const parsed = resourceProfileSchema.safeParse(requested);
    if (!parsed.success) {
      throw new Error(`Invalid resource profile "${requested.name}": ${parsed.error.message}`);
    }
    const profile = parsed.data;

    return this.locks.withLock(`profile:${profile.name}`, async () => {
      if (await this.host.profileExists(profile.name)) {
        logger.info(`Profile '${profile.name}' already exists.`);
        return "existing";
      }

      logger.info(`Creating LXD profile '${profile.name}'...`, {
        cpu: profile.cpuLimit,
        memory: profile.memLimit,
        pool: profile.disk.pool,
      });
      await this.host.createProfile(profile.name);
      await this.host.editProfile(profile.name, renderProfileDocument(profile));
      return "created";
    });
  }
}
