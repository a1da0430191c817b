import { Api, TelegramClient } from 'telegram';
import { LogLevel } from 'telegram/extensions/Logger';
import { StoreSession } from 'telegram/sessions';
import { Prompter } from '../cli/prompts';
import { ChannelMessage, MediaCategory, MessageMedia } from '../media/mediaTypes';
import { logger } from '../utils/logger';
import {
    ChannelSummary,
    IterateMessagesOptions,
    RemoteSessionClient,
    TransferProgressCallback,
} from './sessionClient';

export interface GramJsClientOptions {
    apiId: number;
    apiHash: string;
    sessionName: string;
    prompter: Prompter;
}

// Login mistakes the user can correct by answering the prompt again
const RETRYABLE_AUTH_ERRORS = ['PHONE_CODE_INVALID', 'PHONE_CODE_EMPTY', 'PASSWORD_HASH_INVALID', 'PHONE_NUMBER_INVALID'];

function largestPhotoSize(sizes: Api.TypePhotoSize[]): number {
    let largest = 0;
    for (const size of sizes) {
        if (size instanceof Api.PhotoSize) {
            largest = Math.max(largest, size.size);
        } else if (size instanceof Api.PhotoSizeProgressive) {
            largest = Math.max(largest, ...size.sizes);
        } else if (size instanceof Api.PhotoCachedSize) {
            largest = Math.max(largest, size.bytes.length);
        }
    }
    return largest;
}

export function toMessageMedia(media: Api.TypeMessageMedia | undefined): MessageMedia | undefined {
    if (!media || media instanceof Api.MessageMediaEmpty) {
        return undefined;
    }
    if (media instanceof Api.MessageMediaPhoto && media.photo instanceof Api.Photo) {
        return {
            type: 'photo',
            photoId: media.photo.id.toString(),
            size: largestPhotoSize(media.photo.sizes),
        };
    }
    if (media instanceof Api.MessageMediaDocument && media.document instanceof Api.Document) {
        const document = media.document;
        const fileNameAttribute = document.attributes.find(
            (attribute): attribute is Api.DocumentAttributeFilename => attribute instanceof Api.DocumentAttributeFilename,
        );
        return {
            type: 'document',
            documentId: document.id.toString(),
            mimeType: document.mimeType || undefined,
            fileName: fileNameAttribute?.fileName,
            size: document.size.toJSNumber(),
            isVideo: document.attributes.some((attribute) => attribute instanceof Api.DocumentAttributeVideo),
        };
    }
    return { type: 'other', className: media.className };
}

export function searchFilterFor(category: MediaCategory): Api.TypeMessagesFilter | undefined {
    switch (category) {
        case 'images':
            return new Api.InputMessagesFilterPhotos();
        case 'videos':
            return new Api.InputMessagesFilterVideo();
        case 'pdfs':
        case 'zips':
            return new Api.InputMessagesFilterDocument();
        case 'all':
            return undefined;
    }
}

function messageKey(channelId: string, messageId: number): string {
    return `${channelId}:${messageId}`;
}

/**
 * User-account session backed by GramJS. The login is kept in a StoreSession
 * folder so only the first run asks for phone number and code.
 */
export class GramJsSessionClient implements RemoteSessionClient {
    private readonly client: TelegramClient;
    private readonly prompter: Prompter;
    private readonly channels = new Map<string, Api.Channel>();
    private readonly messages = new Map<string, Api.Message>();

    constructor(options: GramJsClientOptions) {
        this.prompter = options.prompter;
        this.client = new TelegramClient(new StoreSession(options.sessionName), options.apiId, options.apiHash, {
            connectionRetries: 5,
        });
        this.client.setLogLevel(LogLevel.ERROR);
    }

    async connect(): Promise<void> {
        logger.info('Connecting to Telegram...');
        await this.client.start({
            phoneNumber: () => this.prompter.ask('Phone number (international format): '),
            phoneCode: () => this.prompter.ask('Login code: '),
            password: () => this.prompter.ask('Two-step verification password: '),
            onError: async (err: Error) => {
                const retryable = RETRYABLE_AUTH_ERRORS.some((code) => err.message.includes(code));
                logger.error(`Telegram login failed: ${err.message}`);
                // Returning true stops the login flow
                return !retryable;
            },
        });
        logger.info('Connected successfully!');
    }

    async listChannels(): Promise<ChannelSummary[]> {
        const dialogs = await this.client.getDialogs({});
        const summaries: ChannelSummary[] = [];
        this.channels.clear();

        for (const dialog of dialogs) {
            if (!dialog.isChannel || !(dialog.entity instanceof Api.Channel)) continue;
            const entity = dialog.entity;
            const id = entity.id.toString();
            this.channels.set(id, entity);
            summaries.push({
                id,
                title: dialog.name || entity.title,
                username: entity.username || undefined,
            });
        }
        logger.debug(`Found ${summaries.length} joined channel(s) among ${dialogs.length} dialog(s).`);
        return summaries;
    }

    async *iterateRecentMessages(channel: ChannelSummary, options: IterateMessagesOptions): AsyncGenerator<ChannelMessage> {
        const entity = this.channels.get(channel.id);
        if (!entity) {
            throw new Error(`Channel ${channel.id} is not among the listed channels.`);
        }

        const filter = searchFilterFor(options.category);
        for await (const message of this.client.iterMessages(entity, { limit: options.limit, filter })) {
            this.messages.set(messageKey(channel.id, message.id), message);
            yield {
                id: message.id,
                channelId: channel.id,
                date: message.date,
                media: toMessageMedia(message.media),
            };
        }
    }

    async downloadMedia(message: ChannelMessage, destinationPath: string, onProgress?: TransferProgressCallback): Promise<void> {
        const original = this.messages.get(messageKey(message.channelId, message.id));
        if (!original) {
            throw new Error(`Message ${message.id} was not fetched in this session.`);
        }
        await this.client.downloadMedia(original, {
            outputFile: destinationPath,
            progressCallback: (downloaded, total) => onProgress?.(Number(downloaded), Number(total)),
        });
    }

    async disconnect(): Promise<void> {
        // destroy() also stops the update loop, which disconnect() leaves running
        await this.client.destroy();
        logger.info('Disconnected from Telegram.');
    }
}
