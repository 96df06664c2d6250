#!/usr/bin/env node

import { exitProcess, logError } from "@driverfetch/shared";
import { finalizeCommander } from "./utils/commander/finalizeCommander";

// Commands self-register with "commander"
import "./commands/chromedriver";
import "./commands/geckodriver";

process.on("uncaughtException", async error => {
  logError("UncaughtException", { error });
  console.error(error);

  await exitProcess(1);
});

finalizeCommander().catch(async error => {
  logError("Cli:Failed", { error });
  console.error(error);

  await exitProcess(1);
});
