import { logDebug } from "@driverfetch/shared";
import { fetch } from "undici";
import { LATEST_VERSION, chromeDriverHost } from "../config";
import { HttpStatusError } from "../errors/HttpStatusError";

export function getLatestReleaseUrl(version: string = LATEST_VERSION) {
  const latestReleaseUrl = `${chromeDriverHost}/LATEST_RELEASE`;

  return version === LATEST_VERSION ? latestReleaseUrl : `${latestReleaseUrl}_${version}`;
}

/**
 * Returns the full chromedriver version (e.g. "78.0.3904.105") for "latest" or a major version.
 * The response body is returned as-is.
 */
export async function resolveChromeDriverVersion(version: string = LATEST_VERSION) {
  const url = getLatestReleaseUrl(version);

  logDebug("ResolveChromeDriverVersion:Start", { url, version });

  const response = await fetch(url);
  if (!response.ok) {
    throw new HttpStatusError(url, response.status, response.statusText);
  }

  const resolvedVersion = await response.text();

  logDebug("ResolveChromeDriverVersion:Resolved", { resolvedVersion });

  return resolvedVersion;
}
