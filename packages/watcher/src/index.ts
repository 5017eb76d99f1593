import { describeError } from '@mention-watch/shared';
import { loadConfig } from './lib/config.js';
import { createShutdownHandler } from './lib/shutdown.js';
import { loadSites } from './lib/sites.js';
import type { Notifier } from './notifier/notifier.interface.js';
import { NotifySendNotifier } from './notifier/notify-send.notifier.js';
import { NullNotifier } from './notifier/null.notifier.js';
import { EventQueueClient } from './services/event-queue.service.js';
import { SiteWatcher } from './services/site-watcher.service.js';
import { SupervisorService, exitCodeFor, formatReport } from './services/supervisor.service.js';
import { HttpTransport } from './transport/http.transport.js';

async function main() {
    const config = loadConfig();

    console.log(`[main] Loading sites from ${config.sitesPath}`);
    const sitesResult = loadSites(config.sitesPath);

    if (sitesResult.isErr()) {
        console.error(`[main] ${describeError(sitesResult.error)}`);
        process.exit(1);
    }

    const sites = sitesResult.value;
    const notifier: Notifier = config.notifier === 'none' ? new NullNotifier() : new NotifySendNotifier();

    const supervisor = new SupervisorService(
        sites,
        (site) => {
            const transport = new HttpTransport(site, { host: config.chatHost, userAgent: config.userAgent });
            return new SiteWatcher(site, new EventQueueClient(transport, site), notifier);
        },
        {
            maxRestarts: config.maxRestarts,
            onReport: (report) => {
                const log = report.status === 'failed' ? console.error : console.log;
                log(`[main] ${formatReport(report)}`);
            },
        },
    );

    const shutdown = createShutdownHandler(() => supervisor.stop());
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    supervisor.start();
    const reports = await supervisor.wait();

    console.log(`[main] All watchers ended`);
    for (const report of reports) {
        console.log(`[main]   ${formatReport(report)}`);
    }
    process.exit(exitCodeFor(reports));
}

main().catch((e) => {
    console.error('[main] Fatal error:', e);
    process.exit(1);
});
