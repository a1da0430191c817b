/** Filter selected in the media menu; also names the destination sub-folder. */
export type MediaCategory = 'images' | 'videos' | 'pdfs' | 'zips' | 'all';

/** What the classifier makes of a single message. `none` matches only the `all` filter. */
export type MediaKind = Exclude<MediaCategory, 'all'> | 'none';

export interface PhotoMedia {
    type: 'photo';
    photoId: string;
    size: number; // Largest known size in bytes, 0 if unknown
}

export interface DocumentMedia {
    type: 'document';
    documentId: string;
    mimeType?: string;
    fileName?: string; // From the filename attribute, if the sender set one
    size: number;
    isVideo: boolean;
}

export interface OtherMedia {
    type: 'other';
    className: string; // Remote media class, e.g. MessageMediaPoll
}

export type MessageMedia = PhotoMedia | DocumentMedia | OtherMedia;

/** A remote channel message reduced to the fields classification and naming need. */
export interface ChannelMessage {
    id: number;
    channelId: string;
    date: number; // Unix timestamp
    media?: MessageMedia;
}

export interface MediaMessage {
    readonly id: number;
    readonly channelId: string;
    readonly kind: MediaKind;
    readonly fileName: string;
    readonly size: number;
    readonly source: ChannelMessage; // Handle passed back to the transfer capability
}

export type SkipReason = 'exists' | 'duplicate' | 'journal';

export type DownloadOutcome =
    | { status: 'skipped'; reason: SkipReason; path: string }
    | { status: 'succeeded'; path: string; bytes: number }
    | { status: 'failed'; error: Error };

export interface ItemResult {
    item: MediaMessage;
    outcome: DownloadOutcome;
}

export interface DownloadSummary {
    succeeded: number;
    skipped: number;
    failed: number;
    windows: number;
    aborted: boolean;
    results: ItemResult[];
}
