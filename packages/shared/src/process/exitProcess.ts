import { flushLog } from "../logger";

export async function exitProcess(code: number): Promise<never> {
  // Entries logged while exiting would be dropped, so the winston stream is ended first
  await flushLog();

  process.exit(code);
}
