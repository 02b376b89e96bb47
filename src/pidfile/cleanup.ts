/**
 * Cleanup callbacks that must run when the process exits.
 *
 * Armed pid files and pending guard tokens register here so their files are
 * removed on `process.exit()`, on an uncaught exception, and when the event
 * loop drains. Callbacks are plain closures over cleanup state, never over the
 * pid file itself, so a registration does not keep a pid file reachable.
 */
export type CleanupCallback = () => void;

export interface ExitCleanupOptions {
    /** Attach to the process `exit` event on first registration (default: true) */
    hookProcessExit?: boolean;
    /** Receives errors thrown by callbacks */
    onError?: (err: unknown) => void;
}

export class ExitCleanup {
    private pending = new Set<CleanupCallback>();
    private hookProcessExit: boolean;
    private onError: (err: unknown) => void;
    private installed = false;

    constructor(options: ExitCleanupOptions = {}) {
        this.hookProcessExit = options.hookProcessExit ?? true;
        this.onError = options.onError ?? (() => undefined);
    }

    get size(): number {
        return this.pending.size;
    }

    add(callback: CleanupCallback): void {
        this.pending.add(callback);
        this.install();
    }

    delete(callback: CleanupCallback): boolean {
        return this.pending.delete(callback);
    }

    has(callback: CleanupCallback): boolean {
        return this.pending.has(callback);
    }

    /**
     * Run and forget every registered callback, in registration order.
     */
    runAll(): void {
        const callbacks = [...this.pending];
        this.pending.clear();

        for (const callback of callbacks) {
            try {
                callback();
            } catch (err) {
                this.onError(err);
            }
        }
    }

    private install(): void {
        if (this.installed || !this.hookProcessExit) return;
        this.installed = true;
        process.once("exit", () => this.runAll());
    }
}

/** Process-wide registry used unless a pid file or token is given its own. */
export const exitCleanup = new ExitCleanup();
