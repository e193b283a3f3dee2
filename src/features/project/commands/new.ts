/**
 * `specforge new <project-name>` command: scaffold a Go project, or add
 * the scaffold to a cloned repository with `--repo`.
 */
import type { Command as Cmd } from "commander";
import { CliLogger } from "../../../shared/logger.js";
import { TemplateEngine } from "../../generator/template-engine.js";
import { ComponentFactory } from "../../generator/component-factory.js";
import { FileExecutor } from "../executor.js";
import { RepositoryCloner } from "../repository-cloner.js";
import { ProjectCreator } from "../project-creator.js";

interface NewCommandOptions {
  repo?: string;
  destination?: string;
  dryRun?: boolean;
  database: boolean;
  verbose?: boolean;
}

/** Register the `new` subcommand. */
export function registerNew(program: Cmd): void {
  program
    .command("new <project-name>")
    .description("Create a new project scaffold")
    .option("-r, --repo <url>", "Clone this repository and add the scaffold to it")
    .option("-d, --destination <dir>", "Target directory (default: ./<project-name>)")
    .option("--dry-run", "Show what would be created without writing anything")
    .option("--no-database", "Leave database settings out of the scaffold")
    .option("-v, --verbose", "Verbose output")
    .action((projectName: string, opts: NewCommandOptions) => {
      const logger = new CliLogger({ verbose: opts.verbose });
      logger.section("project creation");

      const creator = new ProjectCreator({
        factory: new ComponentFactory(new TemplateEngine(), logger),
        executor: new FileExecutor(logger),
        cloner: new RepositoryCloner(logger),
        logger,
      });

      const result = creator.createProject(projectName, {
        repoUrl: opts.repo,
        destination: opts.destination,
        dryRun: opts.dryRun,
        hasDatabase: opts.database,
      });

      if (result.preserved.length > 0) {
        console.log(`  Preserved ${result.preserved.length} existing file(s).`);
      }
    });
}
