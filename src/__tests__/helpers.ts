import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ChannelMessage, MediaMessage } from '../media/mediaTypes';
import { toMediaMessage } from '../media/fileNaming';
import { Prompter } from '../cli/prompts';
import { MediaTransfer, TransferProgressCallback } from '../telegram/sessionClient';

export const CHANNEL_ID = '1001';

export function photoMessage(id: number): ChannelMessage {
    return { id, channelId: CHANNEL_ID, date: 1_700_000_000, media: { type: 'photo', photoId: `p${id}`, size: 2048 } };
}

export function documentMessage(
    id: number,
    fields: { mimeType?: string; fileName?: string; isVideo?: boolean; size?: number } = {},
): ChannelMessage {
    return {
        id,
        channelId: CHANNEL_ID,
        date: 1_700_000_000,
        media: {
            type: 'document',
            documentId: `d${id}`,
            mimeType: fields.mimeType,
            fileName: fields.fileName,
            size: fields.size ?? 4096,
            isVideo: fields.isVideo ?? false,
        },
    };
}

export function photoItems(count: number, firstId: number = 1): MediaMessage[] {
    return Array.from({ length: count }, (_, index) => toMediaMessage(photoMessage(firstId + index)));
}

export async function makeTempDir(prefix: string = 'media-dl-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export interface Deferred {
    promise: Promise<void>;
    resolve: () => void;
}

export function deferred(): Deferred {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

export function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Transfer stand-in: writes `content-<id>` to the requested path, or throws for
 * ids listed in `failIds`. Records start/end events and the peak number of
 * transfers in flight.
 */
export class StubTransfer implements MediaTransfer {
    readonly calls: number[] = [];
    readonly events: string[] = [];
    readonly failIds: Set<number>;
    inFlight = 0;
    maxInFlight = 0;

    constructor(
        failIds: Iterable<number> = [],
        private readonly gates: Map<number, Promise<void>> = new Map(),
    ) {
        this.failIds = new Set(failIds);
    }

    async downloadMedia(message: ChannelMessage, destinationPath: string, onProgress?: TransferProgressCallback): Promise<void> {
        this.calls.push(message.id);
        this.events.push(`start:${message.id}`);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            await tick();
            const gate = this.gates.get(message.id);
            if (gate) {
                await gate;
            }
            if (this.failIds.has(message.id)) {
                throw new Error(`connection lost while fetching ${message.id}`);
            }
            const content = `content-${message.id}`;
            await fs.writeFile(destinationPath, content);
            onProgress?.(content.length, content.length);
        } finally {
            this.inFlight--;
            this.events.push(`end:${message.id}`);
        }
    }
}

/** Prompter fed from a list of scripted answers. */
export class ScriptedPrompter implements Prompter {
    readonly questions: string[] = [];
    readonly printed: string[] = [];
    closed = false;

    constructor(private readonly answers: string[]) {}

    async ask(question: string): Promise<string> {
        this.questions.push(question);
        const answer = this.answers.shift();
        if (answer === undefined) {
            throw new Error(`No scripted answer left for "${question}"`);
        }
        return answer;
    }

    print(line: string): void {
        // Colors depend on the terminal running the tests
        this.printed.push(line.replace(/\x1b\[[0-9;]*m/g, ''));
    }

    close(): void {
        this.closed = true;
    }
}
