#!/usr/bin/env node

import { parseCliArgs, HELP_TEXT } from "./args";
import { loadEnvFile, resolveConfig } from "./config";
import { isFactCheckError, describeError } from "./errors";
import { runFactCheck } from "./run";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

async function main(): Promise<void> {
    const { help, options } = parseCliArgs(process.argv.slice(2));

    if (help) {
        console.log(HELP_TEXT);
        return;
    }

    const envFile = loadEnvFile(options.envFile);
    if (envFile !== null) {
        logger.debug(`Loaded environment from ${envFile}`, options.debug ?? false);
    }

    const config = resolveConfig(options);
    logger.setDebugEnabled(config.debug);
    logger.setTimingEnabled(config.timing);

    await runFactCheck(config);

    if (config.timing) {
        logger.printTimings();
    }
}

main().catch((err: unknown) => {
    if (isFactCheckError(err)) {
        logger.error(err.message);
    } else {
        logger.error(`Unexpected error: ${describeError(err)}`);
    }
    process.exit(1);
});
