#!/usr/bin/env node
import { config, envInfo } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import { createCodesService } from "../service.js";
import { parseArgs, runCli } from "./run.js";

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  if (!config.dbUrl) {
    logger.debug("Running without a database", {
      envFile: envInfo.envFileExists ? envInfo.envFile : `${envInfo.envFile} (not found)`
    });
  }

  const service = createCodesService(config);
  try {
    process.exitCode = await runCli(options, {
      store: service.store,
      orchestrator: service.orchestrator,
      print: (text) => console.log(text)
    });
  } finally {
    await service.close();
  }
};

run().catch((err) => {
  console.error("isin-codes failed:", errorMessage(err));
  process.exitCode = 1;
});
