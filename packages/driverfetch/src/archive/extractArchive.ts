import { logDebug } from "@driverfetch/shared";
import AdmZip from "adm-zip";
import * as tar from "tar";
import { ArchiveKind } from "./types";

export function extractArchive(archivePath: string, archiveKind: ArchiveKind, destination: string) {
  logDebug("ExtractArchive:Extracting", { archiveKind, archivePath, destination });

  switch (archiveKind) {
    case "zip": {
      const zip = new AdmZip(archivePath);
      zip.extractAllTo(destination, true);
      break;
    }
    case "tar.gz": {
      tar.extract({
        cwd: destination,
        file: archivePath,
        sync: true,
      });
      break;
    }
  }
}
