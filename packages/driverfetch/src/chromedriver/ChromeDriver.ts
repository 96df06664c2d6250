import { logInfo } from "@driverfetch/shared";
import { ensureDirSync } from "fs-extra";
import { join } from "path";
import { addOwnerExecute } from "../archive/addOwnerExecute";
import { downloadFile } from "../archive/downloadFile";
import { extractArchive } from "../archive/extractArchive";
import { removeArchive } from "../archive/removeArchive";
import { ArchiveKind } from "../archive/types";
import { LATEST_VERSION } from "../config";
import { detectOsFamily } from "../platform/detectOsFamily";
import { getHostPlatform } from "../platform/getHostPlatform";
import { HostPlatform } from "../platform/types";
import { DriverOptions } from "../types";
import { getOutputDirectory } from "../utils/getOutputDirectory";
import { getChromeDriverDownload } from "./getChromeDriverDownload";
import { resolveChromeDriverVersion } from "./resolveChromeDriverVersion";

export type ChromeDriverOptions = DriverOptions & {
  // "latest" or a major version such as "78"
  version?: string;
};

export class ChromeDriver {
  readonly archiveKind: ArchiveKind;
  readonly archivePath: string;
  readonly driverPath: string;
  readonly outputDirectory: string;
  readonly platform: HostPlatform;
  readonly url: string;
  readonly version: string;

  private constructor(version: string, platform: HostPlatform, outputDirectory: string) {
    const { archiveKind, url } = getChromeDriverDownload(version, platform);

    this.archiveKind = archiveKind;
    this.archivePath = join(outputDirectory, "chromedriver.zip");
    this.driverPath = join(
      outputDirectory,
      detectOsFamily(platform) === "Windows" ? "chromedriver.exe" : "chromedriver"
    );
    this.outputDirectory = outputDirectory;
    this.platform = platform;
    this.url = url;
    this.version = version;
  }

  /**
   * Resolves the version and download URL up front, so network and platform
   * errors are thrown here rather than from `download()`.
   */
  static async create({
    outputDirectory,
    platform = getHostPlatform(),
    version = LATEST_VERSION,
  }: ChromeDriverOptions = {}) {
    const resolvedVersion = await resolveChromeDriverVersion(version);

    return new ChromeDriver(resolvedVersion, platform, getOutputDirectory(outputDirectory));
  }

  async download() {
    logInfo("ChromeDriver:Download", { url: this.url, version: this.version });

    ensureDirSync(this.outputDirectory);

    await downloadFile(this.url, this.archivePath);

    extractArchive(this.archivePath, this.archiveKind, this.outputDirectory);

    if (detectOsFamily(this.platform) !== "Windows") {
      addOwnerExecute(this.driverPath);
    }

    removeArchive(this.archivePath);

    logInfo("ChromeDriver:Downloaded", { driverPath: this.driverPath });

    return this.driverPath;
  }
}
