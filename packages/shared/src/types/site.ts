import { z } from 'zod';

export const siteSchema = z.object({
    name: z.string().min(1),
    user: z.string().min(1),
    token: z.string().min(1),
});

export const sitesFileSchema = z.object({
    sites: z
        .array(siteSchema)
        .min(1)
        .refine((sites) => new Set(sites.map((s) => s.name)).size === sites.length, 'site names must be unique'),
});

/** A chat account to watch. Frozen once loaded. */
export type Site = Readonly<z.infer<typeof siteSchema>>;

export interface EventQueue {
    readonly site: Site;
    readonly queue_id: string;
    readonly last_event_id: number;
}
