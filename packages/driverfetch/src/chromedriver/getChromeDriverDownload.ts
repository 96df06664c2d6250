import { chromeDriverHost } from "../config";
import { detectOsFamily } from "../platform/detectOsFamily";
import { HostPlatform, OsFamily } from "../platform/types";
import { DriverDownload } from "../types";

const ARCHIVE_SUFFIXES: Record<OsFamily, string> = {
  Darwin: "mac64",
  Linux: "linux64",
  // Windows builds are only published as 32-bit
  Windows: "win32",
};

export function getChromeDriverDownload(version: string, platform: HostPlatform): DriverDownload {
  const suffix = ARCHIVE_SUFFIXES[detectOsFamily(platform)];

  return {
    archiveKind: "zip",
    url: `${chromeDriverHost}/${version}/chromedriver_${suffix}.zip`,
  };
}
