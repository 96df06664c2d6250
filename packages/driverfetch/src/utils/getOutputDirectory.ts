import { resolve } from "path";

export function getOutputDirectory(outputDirectory?: string) {
  return resolve(outputDirectory || process.env.DRIVERFETCH_DIRECTORY || process.cwd());
}
