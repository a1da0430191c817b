import async from 'async';
import fs from 'fs/promises';
import path from 'path';
import { DownloadMode } from '../config';
import { DownloadOutcome, DownloadSummary, ItemResult, MediaMessage } from '../media/mediaTypes';
import { MediaTransfer } from '../telegram/sessionClient';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DownloadJournal, JournalStatus } from './journal';
import { ProgressReporter, ProgressTracker } from './progress';

export interface CoordinatorOptions {
    /** Maximum transfers in flight at once. */
    concurrency: number;
    /**
     * `wave`: admitted items run in consecutive windows of `concurrency` items and
     * a window starts only after the previous one is fully settled.
     * `rolling`: a new transfer starts as soon as any running one settles.
     */
    mode?: DownloadMode;
    progress?: ProgressReporter;
    journal?: DownloadJournal;
    /** Message ids already recorded as finished; these are skipped without a transfer. */
    finishedIds?: ReadonlySet<number>;
}

const PARTIAL_SUFFIX = '.part';

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(describeError(error));
}

export function partitionIntoWindows<T>(items: readonly T[], size: number): T[][] {
    const windows: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        windows.push(items.slice(i, i + size));
    }
    return windows;
}

interface AdmittedItem {
    item: MediaMessage;
    destination: string;
}

/**
 * Downloads a filtered list of channel media into one directory with at most
 * `concurrency` transfers in flight. Existing files, files already claimed
 * earlier in the same run and messages finished in a previous run are skipped
 * before batching, so they never occupy a transfer slot.
 */
export class BatchDownloadCoordinator {
    private readonly transfer: MediaTransfer;
    private readonly concurrency: number;
    private readonly mode: DownloadMode;
    private readonly progress: ProgressReporter;
    private readonly journal?: DownloadJournal;
    private readonly finishedIds: ReadonlySet<number>;

    constructor(transfer: MediaTransfer, options: CoordinatorOptions) {
        if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
            throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
        }
        this.transfer = transfer;
        this.concurrency = options.concurrency;
        this.mode = options.mode ?? 'wave';
        this.progress = options.progress ?? new ProgressTracker();
        this.journal = options.journal;
        this.finishedIds = options.finishedIds ?? new Set<number>();
    }

    /**
     * Only throws when the destination directory cannot be created; every
     * per-item problem ends up as a `failed` outcome in the summary.
     */
    async run(items: readonly MediaMessage[], destinationDir: string, signal?: AbortSignal): Promise<DownloadSummary> {
        await fs.mkdir(destinationDir, { recursive: true });

        const results: ItemResult[] = [];
        const summary: DownloadSummary = { succeeded: 0, skipped: 0, failed: 0, windows: 0, aborted: false, results };
        const settle = (item: MediaMessage, outcome: DownloadOutcome): DownloadOutcome => {
            results.push({ item, outcome });
            summary[outcome.status]++;
            this.progress.itemFinished(item, outcome);
            return outcome;
        };

        this.progress.begin(items.length);

        const admitted = await this.admit(items, destinationDir, settle);
        logger.debug(`${admitted.length} of ${items.length} file(s) need downloading (${summary.skipped} skipped).`);

        const worker = async ({ item, destination }: AdmittedItem): Promise<void> => {
            settle(item, await this.downloadOne(item, destination));
        };

        if (this.mode === 'rolling') {
            if (admitted.length > 0 && !signal?.aborted) {
                summary.windows = 1;
                this.progress.windowStarted(0, admitted.length);
                await async.eachLimit(admitted, this.concurrency, async (entry: AdmittedItem) => {
                    if (signal?.aborted) return;
                    await worker(entry);
                });
            }
        } else {
            const batches = partitionIntoWindows(admitted, this.concurrency);
            for (const [index, batch] of batches.entries()) {
                if (signal?.aborted) break;
                summary.windows++;
                this.progress.windowStarted(index, batch.length);
                // Barrier: the next batch starts only after every item here has settled
                await async.each(batch, worker);
            }
        }

        summary.aborted = results.length < items.length;
        if (summary.aborted) {
            logger.warn(`Download cancelled, ${items.length - results.length} file(s) were not started.`);
        }

        await this.journal?.flush();
        this.progress.end(summary);

        // Listed after the progress display has finished so the lines stay readable
        for (const { item, outcome } of results) {
            if (outcome.status === 'failed') {
                logger.error(`Failed to download message ${item.id} (${item.fileName}): ${outcome.error.message}`);
            }
        }
        return summary;
    }

    private async admit(
        items: readonly MediaMessage[],
        destinationDir: string,
        settle: (item: MediaMessage, outcome: DownloadOutcome) => DownloadOutcome,
    ): Promise<AdmittedItem[]> {
        const claimed = new Set<string>();
        const admitted: AdmittedItem[] = [];

        for (const item of items) {
            const destination = path.join(destinationDir, item.fileName);
            const partialPath = `${destination}${PARTIAL_SUFFIX}`;

            // A name that equals another item's temporary file counts as taken as well
            if (claimed.has(destination) || claimed.has(partialPath)) {
                logger.debug(`Skipping message ${item.id}: ${item.fileName} is already taken by an earlier message.`);
                this.record(item, 'Skipped');
                settle(item, { status: 'skipped', reason: 'duplicate', path: destination });
                continue;
            }
            claimed.add(destination);
            claimed.add(partialPath);

            if (await fileExists(destination)) {
                logger.debug(`Skipping already downloaded file: ${item.fileName}`);
                this.record(item, 'Skipped');
                settle(item, { status: 'skipped', reason: 'exists', path: destination });
                continue;
            }
            if (this.finishedIds.has(item.id)) {
                logger.debug(`Skipping message ${item.id}: finished in an earlier run.`);
                this.record(item, 'Skipped');
                settle(item, { status: 'skipped', reason: 'journal', path: destination });
                continue;
            }

            this.record(item, 'In Queue');
            admitted.push({ item, destination });
        }
        return admitted;
    }

    private async downloadOne(item: MediaMessage, destination: string): Promise<DownloadOutcome> {
        const partialPath = `${destination}${PARTIAL_SUFFIX}`;
        this.record(item, 'Downloading');
        logger.debug(`Downloading message ${item.id} to ${destination}`);

        try {
            await this.transfer.downloadMedia(item.source, partialPath, (transferred, total) => {
                this.progress.itemProgress(item, transferred, total);
            });
            const { size } = await fs.stat(partialPath);
            await fs.rename(partialPath, destination);

            this.record(item, 'Finished');
            logger.debug(`Downloaded message ${item.id}: ${item.fileName} (${size} bytes)`);
            return { status: 'succeeded', path: destination, bytes: size };
        } catch (error: unknown) {
            const cause = toError(error);
            logger.debug(`Error downloading media for message ${item.id}: ${cause.message}`, { stack: cause.stack });
            this.record(item, `Error: ${cause.message}`);
            try {
                await fs.rm(partialPath, { force: true });
            } catch (cleanupError: unknown) {
                logger.warn(`Could not remove partial file ${partialPath}: ${describeError(cleanupError)}`);
            }
            return { status: 'failed', error: cause };
        }
    }

    private record(item: MediaMessage, status: JournalStatus): void {
        this.journal?.record({ channelId: item.channelId, messageId: item.id, fileName: item.fileName, status });
    }
}
