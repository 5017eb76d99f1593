import type { NotificationContent, NotifierError } from '@mention-watch/shared';
import type { ResultAsync } from 'neverthrow';

export interface Notifier {
    readonly type: 'notify-send' | 'none';
    notify(content: NotificationContent): ResultAsync<void, NotifierError>;
}
