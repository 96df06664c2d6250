import { ArchiveKind } from "./archive/types";
import { HostPlatform } from "./platform/types";

export type DriverDownload = {
  archiveKind: ArchiveKind;
  url: string;
};

export type DriverOptions = {
  outputDirectory?: string;
  platform?: HostPlatform;
};
