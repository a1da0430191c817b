import { describe, expect, it } from 'vitest';
import { categoryFolder, classify, matchesCategory } from '../media/classifier';
import { ChannelMessage, MediaKind } from '../media/mediaTypes';
import { CHANNEL_ID, documentMessage, photoMessage } from './helpers';

const pollMessage: ChannelMessage = {
    id: 50,
    channelId: CHANNEL_ID,
    date: 1_700_000_000,
    media: { type: 'other', className: 'MessageMediaPoll' },
};

const textMessage: ChannelMessage = { id: 51, channelId: CHANNEL_ID, date: 1_700_000_000 };

describe('classify', () => {
    it.each<[string, ChannelMessage, MediaKind]>([
        ['photo', photoMessage(1), 'images'],
        ['image document', documentMessage(2, { mimeType: 'image/png', fileName: 'shot.png' }), 'images'],
        ['video by attribute', documentMessage(3, { mimeType: 'application/octet-stream', isVideo: true }), 'videos'],
        ['video by mime type', documentMessage(4, { mimeType: 'video/mp4' }), 'videos'],
        ['pdf', documentMessage(5, { mimeType: 'application/pdf', fileName: 'guide.pdf' }), 'pdfs'],
        ['zip', documentMessage(6, { mimeType: 'application/zip' }), 'zips'],
        ['windows zip', documentMessage(7, { mimeType: 'application/x-zip-compressed' }), 'zips'],
        ['pdf sent as octet-stream', documentMessage(8, { mimeType: 'application/octet-stream', fileName: 'Notes.PDF' }), 'pdfs'],
        ['zip without mime type', documentMessage(9, { fileName: 'bundle.zip' }), 'zips'],
        ['audio', documentMessage(10, { mimeType: 'audio/mpeg', fileName: 'song.mp3' }), 'none'],
        ['unknown binary', documentMessage(11, { mimeType: 'application/octet-stream', fileName: 'data.xyz' }), 'none'],
        ['poll', pollMessage, 'none'],
        ['text only', textMessage, 'none'],
    ])('classifies %s', (_name, message, expected) => {
        expect(classify(message)).toBe(expected);
    });

    it('prefers the declared mime type over the file extension', () => {
        expect(classify(documentMessage(12, { mimeType: 'application/pdf', fileName: 'archive.zip' }))).toBe('pdfs');
    });
});

describe('matchesCategory', () => {
    it('matches the exact kind for specific categories', () => {
        expect(matchesCategory(photoMessage(1), 'images')).toBe(true);
        expect(matchesCategory(photoMessage(1), 'videos')).toBe(false);
        expect(matchesCategory(documentMessage(2, { mimeType: 'application/zip' }), 'zips')).toBe(true);
    });

    it('lets "all" include unclassified files but not media without a file', () => {
        expect(matchesCategory(documentMessage(3, { mimeType: 'audio/mpeg' }), 'all')).toBe(true);
        expect(matchesCategory(documentMessage(3, { mimeType: 'audio/mpeg' }), 'images')).toBe(false);
        expect(matchesCategory(pollMessage, 'all')).toBe(false);
        expect(matchesCategory(textMessage, 'all')).toBe(false);
    });
});

describe('categoryFolder', () => {
    it('maps categories to download sub-folders', () => {
        expect(categoryFolder('images')).toBe('images');
        expect(categoryFolder('videos')).toBe('videos');
        expect(categoryFolder('pdfs')).toBe('pdfs');
        expect(categoryFolder('zips')).toBe('zips');
        expect(categoryFolder('all')).toBe('all_media');
    });
});
