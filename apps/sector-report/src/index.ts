#!/usr/bin/env node
import "dotenv/config";
import { createLogger } from "@sector-report/pipeline-core";
import { runApp } from "./app";

const log = createLogger("app");

async function main() {
  await runApp(process.env);
}

main().catch((err) => {
  log.error({ err }, "sector report failed");
  process.exit(1);
});
