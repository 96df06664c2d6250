import { UnsupportedPlatformError } from "../errors/UnsupportedPlatformError";
import { HostPlatform, OsFamily } from "./types";

export function detectOsFamily({ system }: HostPlatform): OsFamily {
  switch (system) {
    case "Darwin":
    case "Linux":
    case "Windows":
      return system;
    default:
      throw new UnsupportedPlatformError(system);
  }
}
