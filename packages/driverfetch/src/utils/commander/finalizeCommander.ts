import { dim } from "@driverfetch/shared";
import { program } from "commander";

const environmentHelp = `
Environment variables:
  DRIVERFETCH_DIRECTORY          Default output directory ${dim("(current directory)")}
  DRIVERFETCH_CHROMEDRIVER_URL   Base URL for chromedriver releases
  DRIVERFETCH_GECKODRIVER_URL    Base URL for geckodriver releases
  DRIVERFETCH_LOG_LEVEL          Log level written to stderr ${dim("(warn)")}
  DEBUG=driverfetch              Print debug output`;

export async function finalizeCommander(argv: string[] = process.argv) {
  program
    .name("driverfetch")
    .description("Download chromedriver or geckodriver for this machine")
    .configureHelp({ sortSubcommands: true })
    .showHelpAfterError()
    .addHelpText("after", environmentHelp);

  await program.parseAsync(argv);
}
