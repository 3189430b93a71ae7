import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { setLogLevel } from "../../utils/logger";
import { color, describeRollback, ui } from "../ui";

export async function rollbackCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      live: { type: "boolean", default: false },
      force: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const [revision] = positionals;
  if (!revision || positionals.length > 1) {
    ui.error("Specify exactly one revision to roll back to");
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config);
    const { rollback } = createRuntime(config);

    ui.intro("rollback");

    if (values.live && !values.force) {
      const prompt = `Check out ${revision}? The current state will be saved on a new branch.`;
      if (!(await ui.confirmAction(prompt))) {
        ui.cancel("Rollback cancelled");
        return 1;
      }
    }

    const result = await rollback.rollback(revision, { dryRun: !values.live });

    if (!result.success) {
      ui.error(describeRollback(result));
      ui.outro("Rollback failed");
      return 1;
    }

    if (result.dryRun) {
      ui.info(describeRollback(result));
      ui.warn("[DRY RUN] Nothing was changed. Re-run with --live to execute.");
      ui.outro("Dry run complete");
      return 0;
    }

    ui.success(describeRollback(result));
    ui.outro("Rollback complete!");
    return 0;
  } catch (error) {
    ui.error(`Rollback failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat rollback")} - Check out an earlier revision of the application

${color.dim("USAGE:")}
  lifeboat rollback <REVISION> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
      --live              Actually check out the revision (default: dry run)
      --force             Skip confirmation prompt for --live
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  A live rollback first saves the current HEAD as a pre_rollback_* branch,
  then checks out the requested revision.

${color.dim("EXAMPLES:")}
  lifeboat rollback a1b2c3d                # Show what would happen
  lifeboat rollback a1b2c3d --live         # Roll back
`);
}
