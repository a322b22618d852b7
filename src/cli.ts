#!/usr/bin/env node
import dotenv from "dotenv";
import { CliCommand, loadConfig, USAGE } from "./core/config/CliConfig";
import { ConfigurationError } from "./core/errors/LyricsErrors";
import { createRunner } from "./runner";
import { Logger } from "./core/utils/Logger";
import { APP_NAME, APP_VERSION } from "./core/constants";

async function main(): Promise<number> {
    dotenv.config();

    let command: CliCommand;
    try {
        command = loadConfig(process.argv.slice(2));
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`${APP_NAME}: ${error.message}\n\n${USAGE}`);
            return 2;
        }
        throw error;
    }

    if (command.kind === "help") {
        console.log(USAGE);
        return 0;
    }
    if (command.kind === "version") {
        console.log(`${APP_NAME} ${APP_VERSION}`);
        return 0;
    }

    const { config } = command;
    if (config.verbose) {
        Logger.setLevel("debug");
    }
    Logger.debug("[Sync] Configuration", { ...config });

    await createRunner(config).run(config.rootDir);
    return 0;
}

main().then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        Logger.error("[Sync] Unexpected failure", error);
        process.exitCode = 1;
    }
);
