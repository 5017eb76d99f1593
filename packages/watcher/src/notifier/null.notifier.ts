import type { NotificationContent, NotifierError } from '@mention-watch/shared';
import { type ResultAsync, okAsync } from 'neverthrow';
import type { Notifier } from './notifier.interface.js';

export class NullNotifier implements Notifier {
    readonly type = 'none' as const;

    notify(_content: NotificationContent): ResultAsync<void, NotifierError> {
        return okAsync(undefined);
    }
}
