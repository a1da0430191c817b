import pc from 'picocolors';
import xbytes from 'xbytes';
import { DownloadOutcome, DownloadSummary, MediaMessage } from '../media/mediaTypes';
import { logger } from '../utils/logger';

/**
 * Receives coordinator events. `itemFinished` is called exactly once per
 * terminal outcome; several items of one window may finish back to back.
 */
export interface ProgressReporter {
    begin(total: number): void;
    windowStarted(index: number, size: number): void;
    itemProgress(item: MediaMessage, transferred: number, total: number): void;
    itemFinished(item: MediaMessage, outcome: DownloadOutcome): void;
    end(summary: DownloadSummary): void;
}

export interface ProgressCounts {
    done: number;
    succeeded: number;
    skipped: number;
    failed: number;
}

const BAR_WIDTH = 30;

export interface ActiveTransfer {
    id: number;
    transferred: number;
    total: number;
}

/** `#<id> <transferred>/<total>` for every transfer still running. */
export function renderTransfers(transfers: Iterable<ActiveTransfer>): string {
    return Array.from(transfers, ({ id, transferred, total }) => `#${id} ${xbytes(transferred)}/${xbytes(total)}`).join(', ');
}

export function renderBar(counts: ProgressCounts, total: number, width: number = BAR_WIDTH): string {
    const ratio = total === 0 ? 1 : counts.done / total;
    const filled = Math.round(ratio * width);
    return `[${'#'.repeat(filled)}${'.'.repeat(width - filled)}] ${counts.done}/${total}` +
        ` | ok ${counts.succeeded} | skipped ${counts.skipped} | failed ${counts.failed}`;
}

/** Counts-only reporter, also the base for the console renderer. */
export class ProgressTracker implements ProgressReporter {
    protected total = 0;
    protected readonly counts: ProgressCounts = { done: 0, succeeded: 0, skipped: 0, failed: 0 };

    get snapshot(): Readonly<ProgressCounts> {
        return { ...this.counts };
    }

    begin(total: number): void {
        this.total = total;
    }

    windowStarted(_index: number, _size: number): void {}

    itemProgress(_item: MediaMessage, _transferred: number, _total: number): void {}

    itemFinished(_item: MediaMessage, outcome: DownloadOutcome): void {
        this.counts.done++;
        this.counts[outcome.status]++;
    }

    end(_summary: DownloadSummary): void {}
}

export interface OutputStream {
    readonly isTTY?: boolean;
    write(text: string): unknown;
}

/**
 * Single-line progress bar. On a TTY it is redrawn in place and shows the bytes
 * of each running transfer; when output is piped it is printed once per outcome.
 */
export class ConsoleProgress extends ProgressTracker {
    private readonly stream: OutputStream;
    private readonly active = new Map<number, ActiveTransfer>();

    constructor(stream: OutputStream = process.stdout) {
        super();
        this.stream = stream;
    }

    override begin(total: number): void {
        super.begin(total);
        this.stream.write(`${pc.cyan(`Downloading ${total} file(s)...`)}\n`);
        this.draw();
    }

    override windowStarted(index: number, size: number): void {
        logger.debug(`Starting batch ${index + 1} with ${size} download(s).`);
    }

    override itemProgress(item: MediaMessage, transferred: number, total: number): void {
        this.active.set(item.id, { id: item.id, transferred, total: total || item.size });
        // Piped output only gets one line per outcome
        if (this.stream.isTTY) {
            this.draw();
        }
    }

    override itemFinished(item: MediaMessage, outcome: DownloadOutcome): void {
        super.itemFinished(item, outcome);
        this.active.delete(item.id);
        this.draw();
    }

    override end(summary: DownloadSummary): void {
        if (this.stream.isTTY) {
            this.stream.write('\n');
        }
        const color = summary.failed > 0 ? pc.yellow : pc.green;
        const status = summary.aborted ? 'Download cancelled' : 'Download complete';
        this.stream.write(`${color(`${status}: ${summary.succeeded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed.`)}\n`);
    }

    private draw(): void {
        const line = renderBar(this.counts, this.total);
        if (this.stream.isTTY) {
            const transfers = this.active.size > 0 ? ` | ${renderTransfers(this.active.values())}` : '';
            this.stream.write('\r\x1b[2K');
            this.stream.write(pc.blue(`${line}${transfers}`));
        } else {
            this.stream.write(`${line}\n`);
        }
    }
}
