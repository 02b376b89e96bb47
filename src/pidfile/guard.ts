import { exitCleanup as defaultExitCleanup, type CleanupCallback, type ExitCleanup } from "./cleanup.js";
import { PidFileError } from "./errors.js";
import { silentLogger, type LogSink } from "./log.js";
import { errorMessage } from "./process.js";

/**
 * What a token built from a pid file does when it is disposed.
 * - `remove`: `remove()` with the usual ownership checks
 * - `force-remove`: `remove({ force: true })`
 */
export type GuardMode = "remove" | "force-remove";

/** Anything a token can remove; satisfied by `PidFile`. */
export interface Removable {
    remove(options?: { force?: boolean }): unknown;
}

export interface GuardTokenOptions {
    logger?: LogSink;
    exitCleanup?: ExitCleanup;
}

interface PendingAction {
    action: () => void;
    spent: boolean;
    logger: LogSink;
}

interface HeldToken {
    run: CleanupCallback;
    exitCleanup: ExitCleanup;
}

// A token that is dropped without dispose() still fires once it is collected.
const finalizer = new FinalizationRegistry<HeldToken>((held) => {
    held.exitCleanup.delete(held.run);
    held.run();
});

function runOnce(pending: PendingAction): void {
    if (pending.spent) return;
    pending.spent = true;

    try {
        pending.action();
    } catch (err) {
        pending.logger.warn(`Guard cleanup failed: ${errorMessage(err)}`);
    }
}

function actionFor(target: Removable, mode: GuardMode): () => void {
    switch (mode) {
        case "remove":
            return () => {
                target.remove();
            };
        case "force-remove":
            return () => {
                target.remove({ force: true });
            };
        default: {
            const unknownMode: never = mode;
            throw new PidFileError(`Unknown guard mode: ${String(unknownMode)}`);
        }
    }
}

/**
 * Runs a cleanup action exactly once, when the token is disposed.
 *
 * Returned by `PidFile.detachGuardToken()`: the token, not the pid file,
 * decides when the file goes away. Errors from the action are logged and
 * never thrown out of `dispose()`.
 */
export class GuardToken {
    private pending: PendingAction;
    private exitCleanup: ExitCleanup;
    private onExit: CleanupCallback;

    constructor(action: () => void, options?: GuardTokenOptions);
    constructor(target: Removable, mode: GuardMode, options?: GuardTokenOptions);
    constructor(
        actionOrTarget: (() => void) | Removable,
        modeOrOptions?: GuardMode | GuardTokenOptions,
        maybeOptions?: GuardTokenOptions,
    ) {
        const options = (typeof modeOrOptions === "object" ? modeOrOptions : maybeOptions) ?? {};
        const action =
            typeof actionOrTarget === "function"
                ? actionOrTarget
                : actionFor(actionOrTarget, typeof modeOrOptions === "string" ? modeOrOptions : "remove");

        const pending: PendingAction = {
            action,
            spent: false,
            logger: options.logger ?? silentLogger,
        };
        this.pending = pending;
        this.exitCleanup = options.exitCleanup ?? defaultExitCleanup;
        this.onExit = () => runOnce(pending);

        this.exitCleanup.add(this.onExit);
        finalizer.register(this, { run: this.onExit, exitCleanup: this.exitCleanup }, this);
    }

    /** True once the action has run or the token was defused. */
    get spent(): boolean {
        return this.pending.spent;
    }

    dispose(): void {
        this.forget();
        runOnce(this.pending);
    }

    /**
     * Cancel the pending action without running it.
     */
    defuse(): void {
        this.forget();
        this.pending.spent = true;
    }

    private forget(): void {
        finalizer.unregister(this);
        this.exitCleanup.delete(this.onExit);
    }
}
