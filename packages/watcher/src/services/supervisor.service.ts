import { type AppError, type Site, describeError } from '@mention-watch/shared';
import type { SiteWatcher } from './site-watcher.service.js';

export type SiteReport =
    | { site: string; status: 'stopped'; restarts: number }
    | { site: string; status: 'failed'; error: AppError; restarts: number };

export type WatcherFactory = (site: Site) => SiteWatcher;

export interface SupervisorOptions {
    /** Fresh watchers (and queue registrations) to try after a fatal error. */
    maxRestarts?: number;
    /** Fires as soon as a site's watcher has ended for good, not when every site has. */
    onReport?: (report: SiteReport) => void;
}

interface RunningSite {
    controller: AbortController;
    done: Promise<SiteReport>;
}

export function formatReport(report: SiteReport): string {
    const restarts = report.restarts > 0 ? ` after ${report.restarts} restart${report.restarts !== 1 ? 's' : ''}` : '';
    if (report.status === 'stopped') {
        return `${report.site}: stopped${restarts}`;
    }
    return `${report.site}: failed${restarts}: ${describeError(report.error)}`;
}

export function exitCodeFor(reports: readonly SiteReport[]): number {
    return reports.some((r) => r.status === 'failed') ? 1 : 0;
}

/** One independent watcher per site; a site's failure never touches the others. */
export class SupervisorService {
    #running = new Map<string, RunningSite>();
    #reports = new Map<string, SiteReport>();

    constructor(
        private sites: readonly Site[],
        private createWatcher: WatcherFactory,
        private options: SupervisorOptions = {},
    ) {}

    start(): void {
        for (const site of this.sites) {
            if (this.#running.has(site.name)) continue;

            const controller = new AbortController();
            const done = this.#supervise(site, controller.signal).then((report) => {
                this.#reports.set(site.name, report);
                this.options.onReport?.(report);
                return report;
            });
            this.#running.set(site.name, { controller, done });
        }
        console.log(`[supervisor] Started ${this.#running.size} watcher${this.#running.size !== 1 ? 's' : ''}`);
    }

    /** Cancels one site's watcher, or all of them when no name is given. */
    stop(siteName?: string): void {
        for (const [name, running] of this.#running) {
            if (siteName === undefined || siteName === name) {
                running.controller.abort();
            }
        }
    }

    isRunning(siteName: string): boolean {
        const running = this.#running.get(siteName);
        return running !== undefined && !running.controller.signal.aborted && !this.#reports.has(siteName);
    }

    wait(): Promise<SiteReport[]> {
        return Promise.all([...this.#running.values()].map((r) => r.done));
    }

    async #supervise(site: Site, signal: AbortSignal): Promise<SiteReport> {
        const maxRestarts = this.options.maxRestarts ?? 0;
        let restarts = 0;

        for (;;) {
            const result = await this.createWatcher(site).run(signal);
            if (result.isOk()) {
                return { site: site.name, status: 'stopped', restarts };
            }

            console.error(`[supervisor] ${site.name} failed: ${describeError(result.error)}`);
            if (signal.aborted || restarts >= maxRestarts) {
                return { site: site.name, status: 'failed', error: result.error, restarts };
            }

            restarts++;
            console.info(`[supervisor] Restarting ${site.name} (${restarts}/${maxRestarts})`);
        }
    }
}
