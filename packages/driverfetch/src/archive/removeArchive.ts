import { logDebug } from "@driverfetch/shared";
import { unlinkSync } from "fs-extra";

export function removeArchive(archivePath: string) {
  logDebug("RemoveArchive:Deleting", { archivePath });

  unlinkSync(archivePath);
}
