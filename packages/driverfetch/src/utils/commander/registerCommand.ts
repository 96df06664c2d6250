import { logInfo } from "@driverfetch/shared";
import { program } from "commander";

export function registerCommand(commandName: string) {
  return program.command(commandName).hook("preAction", (_, actionCommand) => {
    logInfo("Command:Start", { args: actionCommand.args, commandName });
  });
}
