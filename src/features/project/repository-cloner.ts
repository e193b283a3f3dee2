/**
 * Materializes an existing repository at the destination before the
 * scaffold is written into it.
 *
 * git runs out of process through a {@link CommandRunner}, so tests can
 * substitute a fake that fabricates the clone on disk.
 */
import { execFileSync } from "node:child_process";
import { existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "../../shared/logger.js";
import { GeneratorError } from "../../shared/errors.js";

/** Runs `command` with `args`; throws when the command fails. */
export type CommandRunner = (command: string, args: readonly string[]) => void;

export const execRunner: CommandRunner = (command, args) => {
  execFileSync(command, [...args], { stdio: "inherit" });
};

export class RepositoryCloner {
  constructor(
    private readonly logger: Logger,
    private readonly run: CommandRunner = execRunner,
  ) {}

  checkGitAvailability(): void {
    try {
      this.run("git", ["--version"]);
    } catch (err) {
      throw new GeneratorError(
        "validation",
        "git is not available on this system; install git to clone repositories",
        err,
      );
    }
  }

  /** Clone into a destination that must not exist yet; a failed clone leaves nothing behind. */
  cloneRepository(repoUrl: string, destination: string): void {
    this.logger.info(`Cloning repository: ${repoUrl}`);
    if (existsSync(destination)) {
      throw new GeneratorError("filesystem", `destination directory already exists: ${destination}`);
    }

    try {
      this.run("git", ["clone", repoUrl, destination]);
    } catch (err) {
      rmSync(destination, { recursive: true, force: true });
      throw new GeneratorError("network", `failed to clone repository ${repoUrl}`, err);
    }
    this.logger.info("Repository cloned successfully");
  }

  validateRepository(path: string): void {
    if (!existsSync(join(path, ".git"))) {
      throw new GeneratorError("validation", `cloned directory is not a valid git repository: ${path}`);
    }
    this.logger.debug("Repository validation successful", { path });
  }
}
