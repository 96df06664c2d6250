import { chmodSync, statSync } from "fs-extra";

const OWNER_EXECUTE = 0o100;

export function addOwnerExecute(filePath: string) {
  const { mode } = statSync(filePath);

  chmodSync(filePath, mode | OWNER_EXECUTE);
}
