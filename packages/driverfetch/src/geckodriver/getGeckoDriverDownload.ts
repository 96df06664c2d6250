import { ArchiveKind } from "../archive/types";
import { geckoDriverHost } from "../config";
import { detectOsFamily } from "../platform/detectOsFamily";
import { is64Bit } from "../platform/is64Bit";
import { HostPlatform } from "../platform/types";
import { DriverDownload } from "../types";

type ArchiveName = {
  archiveKind: ArchiveKind;
  suffix: string;
};

function getArchiveName(platform: HostPlatform): ArchiveName {
  switch (detectOsFamily(platform)) {
    case "Darwin":
      return { archiveKind: "tar.gz", suffix: "macos.tar.gz" };
    case "Linux":
      return {
        archiveKind: "tar.gz",
        suffix: is64Bit(platform) ? "linux64.tar.gz" : "linux32.tar.gz",
      };
    case "Windows":
      return {
        archiveKind: "zip",
        suffix: is64Bit(platform) ? "win64.zip" : "win32.zip",
      };
  }
}

export function getGeckoDriverDownload(version: string, platform: HostPlatform): DriverDownload {
  const { archiveKind, suffix } = getArchiveName(platform);

  return {
    archiveKind,
    url: `${geckoDriverHost}/v${version}/geckodriver-v${version}-${suffix}`,
  };
}
