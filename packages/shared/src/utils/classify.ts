import type { MessageFlag } from '../types/event.js';

/** A message is important when it mentions the user or contains one of their alert words. */
export function isImportant(flags: ReadonlySet<MessageFlag>): boolean {
    return flags.has('mentioned') || flags.has('has_alert_word');
}
