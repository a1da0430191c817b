import { ChannelMessage, MediaCategory } from '../media/mediaTypes';

export interface ChannelSummary {
    id: string;
    title: string;
    username?: string;
}

export interface IterateMessagesOptions {
    limit: number;
    category: MediaCategory; // Lets the client narrow the history search server-side
}

export type TransferProgressCallback = (transferred: number, total: number) => void;

/** Moves one message's media bytes to a local path. */
export interface MediaTransfer {
    downloadMedia(message: ChannelMessage, destinationPath: string, onProgress?: TransferProgressCallback): Promise<void>;
}

/**
 * Everything the downloader needs from a logged-in Telegram account.
 * Errors from `connect`, `listChannels` and `iterateRecentMessages` end the run;
 * errors from `downloadMedia` only fail the affected item.
 */
export interface RemoteSessionClient extends MediaTransfer {
    connect(): Promise<void>;
    listChannels(): Promise<ChannelSummary[]>;
    iterateRecentMessages(channel: ChannelSummary, options: IterateMessagesOptions): AsyncIterable<ChannelMessage>;
    disconnect(): Promise<void>;
}
