export type ExitFn = (code: number) => void;

/**
 * The first signal asks the watchers to stop; a second one exits right away,
 * for a watcher stuck in a step that does not observe its abort signal.
 */
export function createShutdownHandler(stop: () => void, exit: ExitFn = (code) => process.exit(code)): () => void {
    let requested = false;

    return () => {
        if (requested) {
            console.warn('[main] Forced exit');
            exit(1);
            return;
        }
        requested = true;
        console.log('[main] Shutting down...');
        stop();
    };
}
