import { machine } from "os";
import { HostPlatform } from "./types";

export function getHostPlatform(): HostPlatform {
  return {
    machine: machine(),
    system: getSystemName(process.platform),
  };
}

function getSystemName(platform: NodeJS.Platform): string {
  switch (platform) {
    case "darwin":
      return "Darwin";
    case "linux":
      return "Linux";
    case "win32":
      return "Windows";
    default:
      return platform;
  }
}
