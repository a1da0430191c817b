import pc from 'picocolors';
import { MediaCategory } from '../media/mediaTypes';
import { ChannelSummary } from '../telegram/sessionClient';
import { Prompter } from './prompts';

export interface MediaMenuOption {
    label: string;
    category: MediaCategory;
}

export const MEDIA_MENU: readonly MediaMenuOption[] = [
    { label: 'Images', category: 'images' },
    { label: 'Videos', category: 'videos' },
    { label: 'PDFs', category: 'pdfs' },
    { label: 'ZIP files', category: 'zips' },
    { label: 'All media types', category: 'all' },
];

export function formatChannelLine(channel: ChannelSummary, position: number): string {
    const username = channel.username ? ` (@${channel.username})` : '';
    return `${position}. ${channel.title}${username} (ID: ${channel.id})`;
}

export function formatChannelList(channels: readonly ChannelSummary[]): string[] {
    return channels.map((channel, index) => formatChannelLine(channel, index + 1));
}

/** Whole number in 1..max, or undefined for anything else. */
export function parseMenuChoice(input: string, max: number): number | undefined {
    const trimmed = input.trim();
    if (!/^\d+$/.test(trimmed)) return undefined;
    const value = parseInt(trimmed, 10);
    return value >= 1 && value <= max ? value : undefined;
}

export async function chooseNumber(prompter: Prompter, question: string, max: number): Promise<number> {
    for (;;) {
        const answer = await prompter.ask(question);
        const choice = parseMenuChoice(answer, max);
        if (choice !== undefined) {
            return choice;
        }
        prompter.print(pc.red(`Invalid selection "${answer}". Please enter a number between 1 and ${max}.`));
    }
}

export async function chooseChannel(prompter: Prompter, channels: readonly ChannelSummary[]): Promise<ChannelSummary> {
    prompter.print(pc.cyan('Joined channels:'));
    for (const line of formatChannelList(channels)) {
        prompter.print(line);
    }
    const choice = await chooseNumber(prompter, 'Enter the number of the channel to select: ', channels.length);
    return channels[choice - 1];
}

export async function chooseCategory(prompter: Prompter): Promise<MediaCategory> {
    prompter.print(pc.cyan('Choose the type of content to download:'));
    MEDIA_MENU.forEach((option, index) => prompter.print(`${index + 1}. ${option.label}`));
    const choice = await chooseNumber(prompter, `Enter your choice (1-${MEDIA_MENU.length}): `, MEDIA_MENU.length);
    return MEDIA_MENU[choice - 1].category;
}
