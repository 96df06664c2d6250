import { DriverFetchError } from "./DriverFetchError";

export class UnsupportedPlatformError extends DriverFetchError {
  system: string;

  constructor(system: string) {
    super("UNSUPPORTED_OS", `Unsupported operating system "${system}"`);

    this.name = "UnsupportedPlatformError";
    this.system = system;
  }
}
