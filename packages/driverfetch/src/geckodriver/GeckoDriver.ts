import { logInfo } from "@driverfetch/shared";
import { ensureDirSync } from "fs-extra";
import assert from "node:assert/strict";
import { join } from "path";
import { downloadFile } from "../archive/downloadFile";
import { extractArchive } from "../archive/extractArchive";
import { removeArchive } from "../archive/removeArchive";
import { ArchiveKind } from "../archive/types";
import { detectOsFamily } from "../platform/detectOsFamily";
import { getHostPlatform } from "../platform/getHostPlatform";
import { HostPlatform } from "../platform/types";
import { DriverOptions } from "../types";
import { getOutputDirectory } from "../utils/getOutputDirectory";
import { getGeckoDriverDownload } from "./getGeckoDriverDownload";

export type GeckoDriverOptions = DriverOptions & {
  // Exact release, e.g. "0.26.0"
  version: string;
};

export class GeckoDriver {
  readonly archiveKind: ArchiveKind;
  readonly archivePath: string;
  readonly driverPath: string;
  readonly outputDirectory: string;
  readonly platform: HostPlatform;
  readonly url: string;
  readonly version: string;

  constructor({ outputDirectory, platform = getHostPlatform(), version }: GeckoDriverOptions) {
    assert(version, "A geckodriver version is required");

    const { archiveKind, url } = getGeckoDriverDownload(version, platform);

    this.archiveKind = archiveKind;
    this.outputDirectory = getOutputDirectory(outputDirectory);
    this.archivePath = join(
      this.outputDirectory,
      archiveKind === "zip" ? "geckodriver.zip" : "geckodriver.tar.gz"
    );
    this.driverPath = join(
      this.outputDirectory,
      detectOsFamily(platform) === "Windows" ? "geckodriver.exe" : "geckodriver"
    );
    this.platform = platform;
    this.url = url;
    this.version = version;
  }

  async download() {
    logInfo("GeckoDriver:Download", { url: this.url, version: this.version });

    ensureDirSync(this.outputDirectory);

    await downloadFile(this.url, this.archivePath);

    extractArchive(this.archivePath, this.archiveKind, this.outputDirectory);

    removeArchive(this.archivePath);

    logInfo("GeckoDriver:Downloaded", { driverPath: this.driverPath });

    return this.driverPath;
  }
}
