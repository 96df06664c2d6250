import { dim, exitProcess, highlight, logError, statusSuccess } from "@driverfetch/shared";
import { ChromeDriver } from "../chromedriver/ChromeDriver";
import { LATEST_VERSION } from "../config";
import { registerCommand } from "../utils/commander/registerCommand";

registerCommand("chromedriver")
  .argument("[version]", `Major version to download ${dim(`(default: "${LATEST_VERSION}")`)}`)
  .option("-o, --output-dir <path>", "Directory to download the driver into")
  .description("Download chromedriver for this platform")
  .action(chromedriver);

async function chromedriver(
  version: string | undefined,
  { outputDir }: { outputDir?: string }
) {
  try {
    const driver = await ChromeDriver.create({
      outputDirectory: outputDir,
      version: version ?? LATEST_VERSION,
    });

    const driverPath = await driver.download();

    console.log(
      statusSuccess("✔"),
      `Downloaded chromedriver ${highlight(driver.version)} to ${highlight(driverPath)}`
    );
  } catch (error) {
    logError("ChromeDriver:Failed", { error });
    console.error(error);

    await exitProcess(1);
  }

  await exitProcess(0);
}
