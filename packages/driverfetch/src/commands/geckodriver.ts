import { exitProcess, highlight, logError, statusSuccess } from "@driverfetch/shared";
import { GeckoDriver } from "../geckodriver/GeckoDriver";
import { registerCommand } from "../utils/commander/registerCommand";

registerCommand("geckodriver")
  .argument("<version>", "Exact version to download, e.g. 0.26.0")
  .option("-o, --output-dir <path>", "Directory to download the driver into")
  .description("Download geckodriver for this platform")
  .action(geckodriver);

async function geckodriver(version: string, { outputDir }: { outputDir?: string }) {
  try {
    const driver = new GeckoDriver({ outputDirectory: outputDir, version });

    const driverPath = await driver.download();

    console.log(
      statusSuccess("✔"),
      `Downloaded geckodriver ${highlight(driver.version)} to ${highlight(driverPath)}`
    );
  } catch (error) {
    logError("GeckoDriver:Failed", { error });
    console.error(error);

    await exitProcess(1);
  }

  await exitProcess(0);
}
