export const chromeDriverHost =
  process.env.DRIVERFETCH_CHROMEDRIVER_URL || "https://chromedriver.storage.googleapis.com";
export const geckoDriverHost =
  process.env.DRIVERFETCH_GECKODRIVER_URL ||
  "https://github.com/mozilla/geckodriver/releases/download";

// Resolves to the newest chromedriver release rather than the newest for a major version
export const LATEST_VERSION = "latest";
