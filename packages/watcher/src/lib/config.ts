import { join } from 'node:path';

export type NotifierKind = 'notify-send' | 'none';

export interface AppConfig {
    sitesPath: string;
    chatHost: string;
    userAgent: string;
    notifier: NotifierKind;
    maxRestarts: number;
}

export function loadConfig(): AppConfig {
    const maxRestarts = parseInt(process.env['WATCHER_MAX_RESTARTS'] ?? '0', 10);
    return {
        sitesPath: process.env['SITES_CONFIG'] ?? join(process.cwd(), 'config.json'),
        chatHost: process.env['CHAT_HOST'] ?? 'zulipchat.com',
        userAgent: process.env['USER_AGENT'] ?? 'mention-watch',
        notifier: process.env['NOTIFIER'] === 'none' ? 'none' : 'notify-send',
        maxRestarts: Number.isNaN(maxRestarts) || maxRestarts < 0 ? 0 : maxRestarts,
    };
}
