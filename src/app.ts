import path from 'path';
import pc from 'picocolors';
import { chooseCategory, chooseChannel } from './cli/menu';
import { Prompter } from './cli/prompts';
import { AppConfig } from './config';
import { BatchDownloadCoordinator } from './download/coordinator';
import { DownloadJournal } from './download/journal';
import { ConsoleProgress, ProgressReporter } from './download/progress';
import { categoryFolder, matchesCategory } from './media/classifier';
import { toMediaMessage } from './media/fileNaming';
import { DownloadSummary, MediaCategory, MediaMessage } from './media/mediaTypes';
import { ChannelSummary, RemoteSessionClient } from './telegram/sessionClient';
import { describeError, SetupError } from './utils/errors';
import { logger } from './utils/logger';

export type RunConfig = Pick<AppConfig, 'BATCH_SIZE' | 'DOWNLOAD_DIR' | 'MESSAGE_LIMIT' | 'DOWNLOAD_MODE'>;

export interface AppDependencies {
    config: RunConfig;
    session: RemoteSessionClient;
    prompter: Prompter;
    progress?: ProgressReporter;
    signal?: AbortSignal;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

async function setupStep<T>(stage: string, message: string, action: () => Promise<T>): Promise<T> {
    try {
        return await action();
    } catch (error: unknown) {
        throw new SetupError(stage, `${message}: ${describeError(error)}`, { cause: error });
    }
}

export async function collectMediaMessages(
    session: RemoteSessionClient,
    channel: ChannelSummary,
    category: MediaCategory,
    limit: number,
): Promise<MediaMessage[]> {
    const collected: MediaMessage[] = [];
    for await (const message of session.iterateRecentMessages(channel, { limit, category })) {
        if (matchesCategory(message, category)) {
            collected.push(toMediaMessage(message));
        }
    }
    return collected;
}

/**
 * Interactive download session: login, channel and media-type selection, then
 * the batched download. Resolves with the process exit code.
 */
export async function runDownloader(deps: AppDependencies): Promise<number> {
    const { config, session, prompter, signal } = deps;

    try {
        await setupStep('connect', 'Could not log in to Telegram', () => session.connect());
        prompter.print(pc.green('Connected successfully!'));

        const channels = await setupStep('list-channels', 'Could not list joined channels', () => session.listChannels());
        if (channels.length === 0) {
            prompter.print(pc.red('No joined channels found. Exiting...'));
            return EXIT_OK;
        }

        const channel = await chooseChannel(prompter, channels);
        prompter.print(pc.yellow(`Selected channel: ${channel.title} (ID: ${channel.id})`));
        const category = await chooseCategory(prompter);

        prompter.print(pc.yellow('Fetching media messages...'));
        const items = await setupStep('iterate-messages', `Could not read messages of ${channel.title}`, () =>
            collectMediaMessages(session, channel, category, config.MESSAGE_LIMIT));
        prompter.print(pc.yellow(`Found ${items.length} messages with matching media.`));

        if (items.length === 0) {
            prompter.print(pc.red('No media found for the selected type.'));
            return EXIT_OK;
        }

        const journal = new DownloadJournal(config.DOWNLOAD_DIR);
        const finishedIds = await journal.loadFinished(channel.id);
        const coordinator = new BatchDownloadCoordinator(session, {
            concurrency: config.BATCH_SIZE,
            mode: config.DOWNLOAD_MODE,
            progress: deps.progress ?? new ConsoleProgress(),
            journal,
            finishedIds,
        });

        const destination = path.join(config.DOWNLOAD_DIR, categoryFolder(category));
        const summary: DownloadSummary = await setupStep('prepare-destination', `Could not prepare ${destination}`, () =>
            coordinator.run(items, destination, signal));

        logger.info(`Run finished for channel ${channel.id}: ${summary.succeeded} downloaded, ` +
            `${summary.skipped} skipped, ${summary.failed} failed in ${summary.windows} batch(es).`);
        return EXIT_OK;
    } catch (error: unknown) {
        if (error instanceof SetupError) {
            logger.error(`Setup failed during ${error.stage}: ${error.message}`);
            prompter.print(pc.red(`${error.message}. Verify your API credentials and Telegram connection.`));
            return EXIT_FAILURE;
        }
        throw error;
    } finally {
        try {
            await session.disconnect();
        } catch (error: unknown) {
            logger.warn(`Failed to disconnect cleanly: ${describeError(error)}`);
        }
    }
}
