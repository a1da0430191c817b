#!/usr/bin/env node
import { AppConfig, loadConfig } from './config';
import { runDownloader, EXIT_FAILURE } from './app';
import { ReadlinePrompter } from './cli/prompts';
import { GramJsSessionClient } from './telegram/gramjsClient';
import { ConfigError, describeError } from './utils/errors';
import { logger, setLogLevel } from './utils/logger';

function readConfig(): AppConfig | null {
    try {
        return loadConfig();
    } catch (error: unknown) {
        if (error instanceof ConfigError) {
            logger.error(`FATAL ERROR: ${error.message} Check your .env file.`);
            return null;
        }
        throw error;
    }
}

async function main(): Promise<number> {
    const config = readConfig();
    if (!config) {
        return EXIT_FAILURE;
    }
    setLogLevel(config.LOG_LEVEL);

    const prompter = new ReadlinePrompter();
    const session = new GramJsSessionClient({
        apiId: config.API_ID,
        apiHash: config.API_HASH,
        sessionName: config.SESSION_NAME,
        prompter,
    });

    // First Ctrl+C stops scheduling new batches, the second one exits immediately
    const controller = new AbortController();
    process.on('SIGINT', () => {
        if (controller.signal.aborted) {
            logger.warn('Received second SIGINT. Exiting now.');
            process.exit(130);
        }
        logger.warn('Received SIGINT. Finishing running downloads, press Ctrl+C again to exit now.');
        controller.abort();
    });

    try {
        return await runDownloader({ config, session, prompter, signal: controller.signal });
    } finally {
        prompter.close();
    }
}

main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        logger.error(`Error in main execution: ${describeError(error)}`, {
            stack: error instanceof Error ? error.stack : undefined,
        });
        process.exit(EXIT_FAILURE);
    });
