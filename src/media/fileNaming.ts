import mime from 'mime-types';
import path from 'path';
import { classify } from './classifier';
import { ChannelMessage, MediaMessage } from './mediaTypes';

// Removes characters that are invalid in Windows/Linux/Mac filenames and caps the length
export function sanitizeFilename(name: string): string {
    let sanitized = name.replace(/[/\\?%*:|"<>\x00-\x1f]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^[-.\s]+|[-.\s]+$/g, '');
    return sanitized.substring(0, 100);
}

export function extensionForMime(mimeType: string | undefined, isVideo: boolean = false): string {
    const known = mimeType ? mime.extension(mimeType) : false;
    if (known) return `.${known}`;
    return isVideo ? '.mp4' : '.bin';
}

/**
 * Name under which a message's media is stored: `<messageId>_<senderFileName>`
 * when the document carries a file name, otherwise `<messageId><ext>`. The id
 * prefix keeps equally named files from different messages apart.
 */
export function suggestFileName(message: ChannelMessage): string {
    const media = message.media;
    const fallbackBase = String(message.id);

    if (!media || media.type === 'other') {
        return `${fallbackBase}.bin`;
    }
    if (media.type === 'photo') {
        return `${fallbackBase}.jpg`;
    }

    if (media.fileName) {
        const parsed = path.parse(media.fileName);
        const base = sanitizeFilename(parsed.name);
        const extBody = sanitizeFilename(parsed.ext).toLowerCase();
        if (base) {
            return `${fallbackBase}_${base}${extBody ? `.${extBody}` : extensionForMime(media.mimeType, media.isVideo)}`;
        }
    }
    return `${fallbackBase}${extensionForMime(media.mimeType, media.isVideo)}`;
}

export function toMediaMessage(message: ChannelMessage): MediaMessage {
    return Object.freeze({
        id: message.id,
        channelId: message.channelId,
        kind: classify(message),
        fileName: suggestFileName(message),
        size: message.media && message.media.type !== 'other' ? message.media.size : 0,
        source: message,
    });
}
