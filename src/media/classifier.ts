import path from 'path';
import { ChannelMessage, MediaCategory, MediaKind } from './mediaTypes';

const ZIP_MIME_TYPES = new Set(['application/zip', 'application/x-zip-compressed', 'application/x-zip']);
const GENERIC_MIME_TYPES = new Set(['', 'application/octet-stream', 'binary/octet-stream']);

const VIDEO_EXTENSIONS = new Set(['.mp4', '.mkv', '.mov', '.avi', '.webm', '.m4v']);
const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.heic']);

const CATEGORY_FOLDERS: Record<MediaCategory, string> = {
    images: 'images',
    videos: 'videos',
    pdfs: 'pdfs',
    zips: 'zips',
    all: 'all_media',
};

function classifyByExtension(fileName: string | undefined): MediaKind {
    if (!fileName) return 'none';
    const ext = path.extname(fileName).toLowerCase();
    if (ext === '.pdf') return 'pdfs';
    if (ext === '.zip') return 'zips';
    if (VIDEO_EXTENSIONS.has(ext)) return 'videos';
    if (IMAGE_EXTENSIONS.has(ext)) return 'images';
    return 'none';
}

/**
 * Maps a message to its media kind from declared metadata only (media type,
 * MIME type, video attribute, file name). Never inspects content and never throws.
 */
export function classify(message: ChannelMessage): MediaKind {
    const media = message.media;
    if (!media) return 'none';

    switch (media.type) {
        case 'photo':
            return 'images';
        case 'document': {
            const mime = (media.mimeType || '').toLowerCase();
            if (mime === 'application/pdf') return 'pdfs';
            if (ZIP_MIME_TYPES.has(mime)) return 'zips';
            if (media.isVideo || mime.startsWith('video/')) return 'videos';
            if (mime.startsWith('image/')) return 'images';
            if (GENERIC_MIME_TYPES.has(mime)) return classifyByExtension(media.fileName);
            return 'none';
        }
        default:
            return 'none';
    }
}

export function matchesCategory(message: ChannelMessage, category: MediaCategory): boolean {
    if (category === 'all') {
        // Polls, locations, link previews and the like carry no file to fetch
        return message.media !== undefined && message.media.type !== 'other';
    }
    return classify(message) === category;
}

export function categoryFolder(category: MediaCategory): string {
    return CATEGORY_FOLDERS[category];
}
