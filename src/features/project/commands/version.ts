/** `specforge version` command. */
import type { Command as Cmd } from "commander";
import { TOOL_NAME, VERSION } from "../../../shared/version.js";

export function registerVersion(program: Cmd): void {
  program
    .command("version")
    .description("Print version information")
    .action(() => {
      console.log(`${TOOL_NAME} ${VERSION}`);
      console.log(`node ${process.version} ${process.platform}/${process.arch}`);
    });
}
