import { type NotificationContent, type NotifierError, notifierError } from '@mention-watch/shared';
import { ResultAsync } from 'neverthrow';
import { execFile } from 'node:child_process';
import type { Notifier } from './notifier.interface.js';

export type ExecFn = (cmd: string, args: string[]) => Promise<void>;

function execFileAsync(cmd: string, args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
        execFile(cmd, args, (error) => {
            if (error) {
                reject(error);
            } else {
                resolve();
            }
        });
    });
}

/** Desktop notifications through the freedesktop `notify-send` command. */
export class NotifySendNotifier implements Notifier {
    readonly type = 'notify-send' as const;

    constructor(private exec: ExecFn = execFileAsync) {}

    notify(content: NotificationContent): ResultAsync<void, NotifierError> {
        // `--` so a summary starting with a dash is not read as an option
        return ResultAsync.fromPromise(this.exec('notify-send', ['--', content.summary, content.body]), (e) =>
            notifierError(`notify-send failed: ${e instanceof Error ? e.message : String(e)}`, e),
        );
    }
}
