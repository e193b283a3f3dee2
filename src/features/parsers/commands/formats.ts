/** `specforge formats` command: list the registered input adapters. */
import type { Command as Cmd } from "commander";
import { createDefaultRegistry } from "../registry.js";

export function registerFormats(program: Cmd): void {
  program
    .command("formats")
    .description("List supported input formats and their file extensions")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const formats = createDefaultRegistry().listFormats();
      if (opts.json) {
        console.log(JSON.stringify(formats, null, 2));
        return;
      }
      console.log("Supported formats:");
      for (const f of formats) {
        console.log(`  ${f.name.padEnd(18)} ${f.extensions.join(", ")}`);
      }
    });
}
