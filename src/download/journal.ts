import async, { QueueObject } from 'async';
import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errors';

export type JournalStatus = 'In Queue' | 'Downloading' | 'Finished' | 'Skipped' | `Error: ${string}`;

export interface JournalEntry {
    channelId: string;
    messageId: number;
    fileName: string;
    status: JournalStatus;
}

export const JOURNAL_FILE_NAME = 'download_log.txt';

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatJournalLine(entry: JournalEntry, at: Date = new Date()): string {
    // Keep the status on one line, error messages may span several
    const status = entry.status.replace(/\s*[\r\n]+\s*/g, ' ');
    return `${formatTimestamp(at)} - Channel ${entry.channelId} - Message ${entry.messageId}: ${entry.fileName} - ${status}\n`;
}

const LINE_PATTERN = /^(.+?) - Channel (\S+) - Message (\d+): (.*) - (.+)$/;

export interface ParsedJournalLine {
    channelId: string;
    messageId: number;
    fileName: string;
    status: string;
}

export function parseJournalLine(line: string): ParsedJournalLine | null {
    const match = LINE_PATTERN.exec(line.trim());
    if (!match) return null;
    const [, , channelId, messageId, fileName, status] = match;
    return {
        channelId,
        messageId: parseInt(messageId, 10),
        fileName,
        status,
    };
}

/**
 * Append-only status log shared by every download of a run. Lines go through a
 * single-worker queue so concurrent downloads never interleave partial writes.
 */
export class DownloadJournal {
    readonly filePath: string;
    private readonly writeQueue: QueueObject<string>;

    constructor(downloadRoot: string) {
        this.filePath = path.join(downloadRoot, JOURNAL_FILE_NAME);
        this.writeQueue = async.queue<string>(async (line: string) => {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.appendFile(this.filePath, line, { encoding: 'utf8' });
        }, 1);
    }

    record(entry: JournalEntry): void {
        this.writeQueue.push(formatJournalLine(entry), (err) => {
            if (err) {
                logger.warn(`Failed to write download journal entry for message ${entry.messageId}: ${describeError(err)}`);
            }
        });
    }

    /** Resolves once every recorded line has been written (or has failed). */
    async flush(): Promise<void> {
        if (this.writeQueue.idle()) return;
        await this.writeQueue.drain();
    }

    /** Message ids that reached `Finished` in an earlier run for this channel. */
    async loadFinished(channelId: string): Promise<Set<number>> {
        const finished = new Set<number>();
        let content: string;
        try {
            content = await fs.readFile(this.filePath, { encoding: 'utf8' });
        } catch (error: unknown) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return finished;
            }
            logger.warn(`Could not read download journal ${this.filePath}: ${describeError(error)}`);
            return finished;
        }

        for (const line of content.split('\n')) {
            const entry = parseJournalLine(line);
            if (entry && entry.status === 'Finished' && entry.channelId === channelId) {
                finished.add(entry.messageId);
            }
        }
        logger.debug(`Loaded ${finished.size} finished message(s) for channel ${channelId} from journal.`);
        return finished;
    }
}
