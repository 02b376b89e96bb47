import { describe, it, expect, beforeEach, vi } from "vitest";
import { GuardToken } from "../src/pidfile/guard.js";
import { ExitCleanup } from "../src/pidfile/cleanup.js";

describe("GuardToken", () => {
    let exitCleanup: ExitCleanup;

    beforeEach(() => {
        exitCleanup = new ExitCleanup({ hookProcessExit: false });
    });

    it("should run the action once when disposed", () => {
        const action = vi.fn();
        const token = new GuardToken(action, { exitCleanup });

        expect(action).not.toHaveBeenCalled();
        token.dispose();
        token.dispose();

        expect(action).toHaveBeenCalledTimes(1);
        expect(token.spent).toBe(true);
    });

    it("should not run the action once defused", () => {
        const action = vi.fn();
        const token = new GuardToken(action, { exitCleanup });

        token.defuse();
        token.dispose();

        expect(action).not.toHaveBeenCalled();
        expect(token.spent).toBe(true);
        expect(exitCleanup.size).toBe(0);
    });

    it("should log a failing action instead of throwing", () => {
        const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const token = new GuardToken(
            () => {
                throw new Error("nope");
            },
            { logger, exitCleanup },
        );

        expect(() => token.dispose()).not.toThrow();
        expect(logger.warn).toHaveBeenCalledWith("Guard cleanup failed: nope");
    });

    it("should run a pending action when the process exits", () => {
        const action = vi.fn();
        const token = new GuardToken(action, { exitCleanup });
        expect(exitCleanup.size).toBe(1);

        exitCleanup.runAll();
        token.dispose();

        expect(action).toHaveBeenCalledTimes(1);
    });

    it("should unregister from exit cleanup once disposed", () => {
        const token = new GuardToken(vi.fn(), { exitCleanup });
        token.dispose();
        expect(exitCleanup.size).toBe(0);
    });

    describe("built from a removable target", () => {
        it("should call remove() in remove mode", () => {
            const target = { remove: vi.fn() };
            new GuardToken(target, "remove", { exitCleanup }).dispose();
            expect(target.remove).toHaveBeenCalledTimes(1);
            expect(target.remove).toHaveBeenCalledWith();
        });

        it("should force the removal in force-remove mode", () => {
            const target = { remove: vi.fn() };
            new GuardToken(target, "force-remove", { exitCleanup }).dispose();
            expect(target.remove).toHaveBeenCalledWith({ force: true });
        });
    });
});
