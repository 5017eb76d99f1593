import type { Message, MessageRecipients } from '../types/event.js';

export const NO_RECIPIENTS = '<no users>';

const SITE_COLUMN_WIDTH = 20;

export interface NotificationContent {
    summary: string;
    body: string;
}

export function formatRecipients(recipients: MessageRecipients): string {
    if (recipients.kind === 'stream') {
        return `#${recipients.name}`;
    }
    if (recipients.users.length === 0) {
        return NO_RECIPIENTS;
    }
    return recipients.users.map((u) => `@${u.full_name}`).join(',');
}

/** Wall-clock time in the local timezone, `HH:MM:SS`. */
export function formatLocalTime(date: Date): string {
    return [date.getHours(), date.getMinutes(), date.getSeconds()].map((n) => String(n).padStart(2, '0')).join(':');
}

export function formatHeader(message: Message): string {
    return `[${formatLocalTime(message.timestamp)}] @${message.sender_full_name} -> ${formatRecipients(message.recipients)}`;
}

export function formatMessage(message: Message): string {
    return `${formatHeader(message)}: ${message.content}`;
}

export function formatConsoleLine(siteName: string, message: Message, important: boolean): string {
    return `${important ? '!' : ' '} ${siteName.padEnd(SITE_COLUMN_WIDTH)} ${formatMessage(message)}`;
}

export function formatNotification(siteName: string, message: Message): NotificationContent {
    return {
        summary: `${siteName} ${formatHeader(message)}`,
        body: message.content,
    };
}
