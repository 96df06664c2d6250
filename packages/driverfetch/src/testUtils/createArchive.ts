import AdmZip from "adm-zip";
import { mkdtempSync, readFileSync, removeSync, writeFileSync } from "fs-extra";
import { tmpdir } from "os";
import { join } from "path";
import * as tar from "tar";

type Files = Record<string, string>;

export function createZip(files: Files) {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content));
  }

  return zip.toBuffer();
}

export function createTar(files: Files) {
  return packTar(files, false);
}

export function createTarGz(files: Files) {
  return packTar(files, true);
}

function packTar(files: Files, gzip: boolean) {
  const sourceDirectory = mkdtempSync(join(tmpdir(), "driverfetch-source-"));
  try {
    for (const [name, content] of Object.entries(files)) {
      writeFileSync(join(sourceDirectory, name), content);
    }

    const archivePath = join(sourceDirectory, gzip ? "archive.tar.gz" : "archive.tar");
    tar.create(
      {
        cwd: sourceDirectory,
        file: archivePath,
        gzip,
        sync: true,
      },
      Object.keys(files)
    );

    return readFileSync(archivePath);
  } finally {
    removeSync(sourceDirectory);
  }
}
