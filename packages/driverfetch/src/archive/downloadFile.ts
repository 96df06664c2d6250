import { logDebug } from "@driverfetch/shared";
import { writeFileSync } from "fs-extra";
import { fetch } from "undici";
import { HttpStatusError } from "../errors/HttpStatusError";

export async function downloadFile(url: string, filePath: string) {
  logDebug("DownloadFile:Start", { filePath, url });

  const response = await fetch(url);
  if (!response.ok) {
    logDebug("DownloadFile:UnexpectedStatus", { statusCode: response.status, url });

    throw new HttpStatusError(url, response.status, response.statusText);
  }

  const buffer = Buffer.from(await response.arrayBuffer());

  writeFileSync(filePath, buffer);

  logDebug("DownloadFile:Written", { byteLength: buffer.byteLength, filePath });
}
