import { z } from 'zod';

export const KNOWN_MESSAGE_FLAGS = ['read', 'mentioned', 'has_alert_word'] as const;

export type MessageFlag = (typeof KNOWN_MESSAGE_FLAGS)[number];

const knownFlags: ReadonlySet<string> = new Set(KNOWN_MESSAGE_FLAGS);

function isKnownFlag(flag: string): flag is MessageFlag {
    return knownFlags.has(flag);
}

export interface User {
    full_name: string;
}

export type MessageRecipients = { kind: 'stream'; name: string } | { kind: 'users'; users: User[] };

// servers may send kinds beyond these two; nothing branches on it
export type MessageKind = 'stream' | 'private' | (string & {});

export interface Message {
    content: string;
    recipients: MessageRecipients;
    sender_full_name: string;
    timestamp: Date;
    type: MessageKind;
}

export type EventPayload =
    | { type: 'heartbeat' }
    | { type: 'message'; flags: ReadonlySet<MessageFlag>; message: Message }
    | { type: 'other'; event_type: string };

export interface ChatEvent {
    id: number;
    payload: EventPayload;
}

// --- Wire schemas ---

const userSchema = z.object({
    full_name: z.string(),
});

export const recipientsSchema = z.union([
    z.string().transform((name): MessageRecipients => ({ kind: 'stream', name })),
    z.array(userSchema).transform((users): MessageRecipients => ({ kind: 'users', users })),
]);

export const messageSchema = z
    .object({
        content: z.string(),
        display_recipient: recipientsSchema,
        sender_full_name: z.string(),
        // seconds since the epoch
        timestamp: z.number(),
        type: z.string(),
    })
    .transform(
        (raw): Message => ({
            content: raw.content,
            recipients: raw.display_recipient,
            sender_full_name: raw.sender_full_name,
            timestamp: new Date(raw.timestamp * 1000),
            type: raw.type,
        }),
    );

/** Unknown flags are dropped rather than rejected. */
export const messageFlagsSchema = z
    .array(z.string())
    .transform((flags): ReadonlySet<MessageFlag> => new Set(flags.filter(isKnownFlag)));

const eventIdSchema = z.number().int();

const heartbeatEventSchema = z
    .object({ id: eventIdSchema, type: z.literal('heartbeat') })
    .transform((raw): ChatEvent => ({ id: raw.id, payload: { type: 'heartbeat' } }));

const messageEventSchema = z
    .object({
        id: eventIdSchema,
        type: z.literal('message'),
        flags: messageFlagsSchema,
        message: messageSchema,
    })
    .transform((raw): ChatEvent => ({ id: raw.id, payload: { type: 'message', flags: raw.flags, message: raw.message } }));

const otherEventSchema = z
    .object({
        id: eventIdSchema,
        type: z.string().refine((type) => type !== 'heartbeat' && type !== 'message', 'reserved event type'),
    })
    .transform((raw): ChatEvent => ({ id: raw.id, payload: { type: 'other', event_type: raw.type } }));

function schemaFor(type: string): z.ZodType<ChatEvent, z.ZodTypeDef, unknown> {
    switch (type) {
        case 'heartbeat':
            return heartbeatEventSchema;
        case 'message':
            return messageEventSchema;
        default:
            return otherEventSchema;
    }
}

/** Dispatches on `type` so a malformed known event reports its own issues. */
export const chatEventSchema = z
    .object({ type: z.string() })
    .passthrough()
    .transform((raw, ctx): ChatEvent => {
        const parsed = schemaFor(raw.type).safeParse(raw);
        if (!parsed.success) {
            for (const issue of parsed.error.issues) {
                ctx.addIssue(issue);
            }
            return z.NEVER;
        }
        return parsed.data;
    });
