import { HostPlatform } from "./types";

/**
 * Substring match on the machine identifier: "x86_64", "amd64" and "arm64" count,
 * "i686" and "armv7l" do not.
 */
export function is64Bit({ machine }: HostPlatform) {
  return machine.includes("64");
}
