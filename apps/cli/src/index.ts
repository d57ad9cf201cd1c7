// apps/cli — diffscribe CLI entry point
import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { analyzeCommand } from "./commands/analyze.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf8"));
    if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    if (process.env["DIFFSCRIBE_DEBUG"]) console.error(err);
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("diffscribe")
  .description("Turn the diff between two refs into a QA changelog and a developer README.")
  .version(readVersion(), "-v, --version")
  // Usage errors exit 2; help and version exit 0
  .exitOverride((err: CommanderError) => {
    process.exit(err.exitCode === 0 ? 0 : 2);
  });

analyzeCommand.exitOverride((err: CommanderError) => {
  process.exit(err.exitCode === 0 ? 0 : 2);
});
program.addCommand(analyzeCommand);

await program.parseAsync();
