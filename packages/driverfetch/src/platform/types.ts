export type OsFamily = "Darwin" | "Linux" | "Windows";

export type HostPlatform = {
  // Machine architecture, e.g. "x86_64", "i686" or "arm64"
  machine: string;
  // "Darwin", "Linux" or "Windows" on supported hosts; anything else is rejected later
  system: string;
};
