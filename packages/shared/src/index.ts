export { logDebug, logError, logInfo } from "./logger";
export type { Tags } from "./logger";
export { exitProcess } from "./process/exitProcess";
export { dim, highlight, statusSuccess } from "./theme";
