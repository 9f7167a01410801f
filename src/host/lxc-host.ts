import { z } from "zod";
import { logger } from "../config/logger.js";
import { type CommandResult, type CommandRunner, CommandNotFoundError, type RunOptions } from "./command-runner.js";
import { ContainerLaunchError, HostUnavailableError } from "./errors.js";

const containerAddressSchema = z.object({
  family: z.string(),
  address: z.string(),
  scope: z.string(),
});

const containerInfoSchema = z.object({
  name: z.string(),
  status: z.string(),
  state: z
    .object({
      network: z
        .record(z.string(), z.object({ addresses: z.array(containerAddressSchema).default(() => []) }))
        .nullish(),
    })
    .nullish(),
});

const containerListSchema = z.array(containerInfoSchema);

export type ContainerInfo = z.infer<typeof containerInfoSchema>;

export interface ExecOptions {
  env?: Record<string, string>;
  input?: string;
}

/**
 * Operations on the container host control plane. The orchestrator and
 * provisioners only see this interface; LxcHost backs it with the `lxc` CLI.
 */
export interface ContainerHost {
  info(): Promise<void>;
  profileExists(name: string): Promise<boolean>;
  createProfile(name: string): Promise<void>;
  editProfile(name: string, document: string): Promise<void>;
  listContainers(): Promise<ContainerInfo[]>;
  launch(name: string, image: string, profiles: readonly string[]): Promise<void>;
  start(name: string): Promise<void>;
  exec(name: string, argv: readonly string[], options?: ExecOptions): Promise<CommandResult>;
  serviceState(name: string, unit: string): Promise<string>;
  readFile(name: string, path: string): Promise<string>;
  writeFile(name: string, path: string, content: string): Promise<void>;
  ipv4Address(name: string): Promise<string | null>;
}

export class LxcHost implements ContainerHost {
  constructor(
    private readonly runner: CommandRunner,
    private readonly lxcBin = "lxc",
  ) {}

  /** Preflight: the client exists and the daemon answers. */
  async info(): Promise<void> {
    const res = await this.lxc(["info"]);
    if (res.exitCode !== 0) {
      throw new HostUnavailableError(firstLine(res.stderr) || `lxc info exited ${res.exitCode}`);
    }
  }

  async profileExists(name: string): Promise<boolean> {
    const res = await this.lxc(["profile", "show", name]);
    if (res.exitCode === 0) return true;
    if (/not found/i.test(res.stderr)) return false;
    throw new HostUnavailableError(firstLine(res.stderr) || `lxc profile show exited ${res.exitCode}`);
  }

  async createProfile(name: string): Promise<void> {
    await this.lxcOrUnavailable(["profile", "create", name]);
  }

  async editProfile(name: string, document: string): Promise<void> {
    await this.lxcOrUnavailable(["profile", "edit", name], { input: document });
  }

  async listContainers(): Promise<ContainerInfo[]> {
    const res = await this.lxcOrUnavailable(["list", "--format", "json"]);
    let raw: unknown;
    try {
      raw = JSON.parse(res.stdout);
    } catch {
      throw new HostUnavailableError("lxc list returned malformed JSON");
    }
    const parsed = containerListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HostUnavailableError(`unexpected lxc list output: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async launch(name: string, image: string, profiles: readonly string[]): Promise<void> {
    const args = ["launch", image, name, ...profiles.flatMap((p) => ["--profile", p])];
    const res = await this.lxc(args);
    if (res.exitCode !== 0) {
      throw new ContainerLaunchError(name, firstLine(res.stderr) || `exit ${res.exitCode}`);
    }
  }

  async start(name: string): Promise<void> {
    const res = await this.lxc(["start", name]);
    if (res.exitCode !== 0) {
      throw new ContainerLaunchError(name, firstLine(res.stderr) || `exit ${res.exitCode}`);
    }
  }

  exec(name: string, argv: readonly string[], options: ExecOptions = {}): Promise<CommandResult> {
    const envArgs = Object.entries(options.env ?? {}).flatMap(([k, v]) => ["--env", `${k}=${v}`]);
    return this.lxc(["exec", name, ...envArgs, "--", ...argv], { input: options.input });
  }

  async serviceState(name: string, unit: string): Promise<string> {
    try {
      const res = await this.exec(name, ["systemctl", "is-active", unit]);
      return res.stdout.trim() || "unknown";
    } catch (err) {
      logger.debug(`Service state query for ${unit} in ${name} failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return "unknown";
    }
  }

  async readFile(name: string, path: string): Promise<string> {
    const res = await this.exec(name, ["cat", path]);
    if (res.exitCode !== 0) {
      throw new Error(`Cannot read ${path} in ${name}: ${firstLine(res.stderr)}`);
    }
    return res.stdout;
  }

  async writeFile(name: string, path: string, content: string): Promise<void> {
    const res = await this.exec(name, ["tee", path], { input: content });
    if (res.exitCode !== 0) {
      throw new Error(`Cannot write ${path} in ${name}: ${firstLine(res.stderr)}`);
    }
  }

  async ipv4Address(name: string): Promise<string | null> {
    const containers = await this.listContainers();
    const container = containers.find((c) => c.name === name);
    const nic = container?.state?.network?.eth0;
    const addr = nic?.addresses.find((a) => a.family === "inet" && a.scope === "global");
    return addr?.address ?? null;
  }

  private async lxc(args: readonly string[], options?: RunOptions): Promise<CommandResult> {
    try {
      return await this.runner.run(this.lxcBin, args, options);
    } catch (err) {
      if (err instanceof CommandNotFoundError) {
        throw new HostUnavailableError(`${this.lxcBin} not found; install LXD and try again`);
      }
      throw err;
    }
  }

  private async lxcOrUnavailable(args: readonly string[], options?: RunOptions): Promise<CommandResult> {
    const res = await this.lxc(args, options);
    if (res.exitCode !== 0) {
      throw new HostUnavailableError(`lxc ${args.slice(0, 2).join(" ")}: ${firstLine(res.stderr) || `exit ${res.exitCode}`}`);
    }
    return res;
  }
}

function firstLine(text: string): string {
  return text.trim().split("\n")[0] ?? "";
}
