/**
 * `specforge new`: scaffold a project, optionally on top of a cloned
 * repository.
 *
 * The scaffold model has no entities; only project-level templates are
 * rendered. Files already present at the destination (from the clone or
 * from earlier runs) are preserved.
 */
import { rmSync } from "node:fs";
import { createDomainModel, type DomainModel } from "../../shared/types/model.js";
import type { Logger } from "../../shared/logger.js";
import { TOOL_NAME, VERSION } from "../../shared/version.js";
import type { ComponentFactory } from "../generator/component-factory.js";
import { preserveExistingFiles } from "../generator/preservation.js";
import type { FileExecutor } from "./executor.js";
import type { RepositoryCloner } from "./repository-cloner.js";
import { validateDestination, validateProjectName } from "./validator.js";

export interface CreateProjectOptions {
  /** Clone this repository first and add the scaffold to it. */
  repoUrl?: string;
  /** Defaults to a directory named after the project. */
  destination?: string;
  dryRun?: boolean;
  /** Include database settings and targets. Default: true. */
  hasDatabase?: boolean;
  signal?: AbortSignal;
}

export interface CreateProjectResult {
  projectName: string;
  destination: string;
  written: string[];
  preserved: string[];
  existingRepository: boolean;
  dryRun: boolean;
}

export interface ProjectCreatorDeps {
  factory: ComponentFactory;
  executor: FileExecutor;
  cloner: RepositoryCloner;
  logger: Logger;
}

/** The entity-less model a scaffold is rendered from. */
export function scaffoldModel(projectName: string): DomainModel {
  return createDomainModel({
    projectName,
    entities: [],
    relations: [],
    metadata: { sourceFormat: "scaffold", generatedBy: TOOL_NAME, version: VERSION },
  });
}

export class ProjectCreator {
  constructor(private readonly deps: ProjectCreatorDeps) {}

  createProject(projectName: string, options: CreateProjectOptions = {}): CreateProjectResult {
    const { logger } = this.deps;
    const dryRun = options.dryRun ?? false;

    validateProjectName(projectName);
    if (options.destination) validateDestination(options.destination);
    const destination = options.destination || projectName;

    logger.info(`Creating new project: ${projectName}`);

    const existingRepository = Boolean(options.repoUrl);
    if (options.repoUrl) {
      this.cloneInto(options.repoUrl, destination, dryRun);
    }

    const files = this.deps.factory.generateProjectFiles(scaffoldModel(projectName), {
      hasDatabase: options.hasDatabase,
    });
    const { safe, preserved } = preserveExistingFiles(destination, files, logger);
    const { files: written } = this.deps.executor.execute(safe, destination, {
      dryRun,
      signal: options.signal,
    });

    if (dryRun) {
      logger.info("Dry run completed; no files were created");
    } else {
      logger.info(`Created project '${projectName}' in '${destination}'`);
      logger.info("Next steps:");
      logger.info(`  1. cd ${destination}`);
      logger.info("  2. make test");
    }

    return { projectName, destination, written, preserved, existingRepository, dryRun };
  }

  private cloneInto(repoUrl: string, destination: string, dryRun: boolean): void {
    const { cloner, logger } = this.deps;
    if (dryRun) {
      logger.info(`DRY RUN: would clone ${repoUrl} to ${destination}`);
      return;
    }
    cloner.checkGitAvailability();
    cloner.cloneRepository(repoUrl, destination);
    try {
      cloner.validateRepository(destination);
    } catch (err) {
      rmSync(destination, { recursive: true, force: true });
      throw err;
    }
  }
}
