export { ChromeDriver } from "./chromedriver/ChromeDriver";
export type { ChromeDriverOptions } from "./chromedriver/ChromeDriver";
export { getChromeDriverDownload } from "./chromedriver/getChromeDriverDownload";
export {
  getLatestReleaseUrl,
  resolveChromeDriverVersion,
} from "./chromedriver/resolveChromeDriverVersion";
export { GeckoDriver } from "./geckodriver/GeckoDriver";
export type { GeckoDriverOptions } from "./geckodriver/GeckoDriver";
export { getGeckoDriverDownload } from "./geckodriver/getGeckoDriverDownload";
export { addOwnerExecute } from "./archive/addOwnerExecute";
export { downloadFile } from "./archive/downloadFile";
export { extractArchive } from "./archive/extractArchive";
export { removeArchive } from "./archive/removeArchive";
export type { ArchiveKind } from "./archive/types";
export { detectOsFamily } from "./platform/detectOsFamily";
export { getHostPlatform } from "./platform/getHostPlatform";
export { is64Bit } from "./platform/is64Bit";
export type { HostPlatform, OsFamily } from "./platform/types";
export { DriverFetchError } from "./errors/DriverFetchError";
export type { DriverFetchErrorCode } from "./errors/DriverFetchError";
export { HttpStatusError } from "./errors/HttpStatusError";
export { UnsupportedPlatformError } from "./errors/UnsupportedPlatformError";
export { LATEST_VERSION } from "./config";
export type { DriverDownload, DriverOptions } from "./types";
