#!/usr/bin/env node

import color from "picocolors";
import { main, resolveAppDir } from "./cli/main";
import { APP_NAME } from "./config";

const controller = new AbortController();

function onSignal(signal: NodeJS.Signals): void {
  if (!controller.signal.aborted) {
    console.error(color.yellow(`Received ${signal}, stopping rsync...`));
    controller.abort();
  }
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

main(process.argv.slice(2), {
  appDir: resolveAppDir(process.argv[1], process.env),
  scriptName: APP_NAME,
  env: process.env,
  startedAt: new Date(),
  signal: controller.signal,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exitCode = 1;
  })
  .finally(() => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
