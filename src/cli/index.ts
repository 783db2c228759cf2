#!/usr/bin/env node
import { createLogger } from "../shared/logger.js";
import { runCli } from "./run.js";

const log = createLogger("main");

process.on("SIGINT", () => {
  process.stdout.write("\n\n👋 Research session ended\n");
  process.exit(0);
});

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { reason: String(reason) });
});

process.exitCode = await runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  env: process.env,
});
