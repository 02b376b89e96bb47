import { describe, it, expect, vi } from "vitest";
import { ExitCleanup } from "../src/pidfile/cleanup.js";

describe("ExitCleanup", () => {
    it("should run callbacks in registration order and forget them", () => {
        const registry = new ExitCleanup({ hookProcessExit: false });
        const calls: string[] = [];
        registry.add(() => calls.push("first"));
        registry.add(() => calls.push("second"));

        registry.runAll();
        registry.runAll();

        expect(calls).toEqual(["first", "second"]);
        expect(registry.size).toBe(0);
    });

    it("should skip deleted callbacks", () => {
        const registry = new ExitCleanup({ hookProcessExit: false });
        const callback = vi.fn();
        registry.add(callback);

        expect(registry.has(callback)).toBe(true);
        expect(registry.delete(callback)).toBe(true);
        registry.runAll();

        expect(callback).not.toHaveBeenCalled();
    });

    it("should keep going after a callback throws", () => {
        const onError = vi.fn();
        const registry = new ExitCleanup({ hookProcessExit: false, onError });
        const failure = new Error("boom");
        const after = vi.fn();
        registry.add(() => {
            throw failure;
        });
        registry.add(after);

        registry.runAll();

        expect(onError).toHaveBeenCalledWith(failure);
        expect(after).toHaveBeenCalledTimes(1);
    });

    it("should attach to process exit once", () => {
        const before = process.listenerCount("exit");
        const registry = new ExitCleanup();
        registry.add(vi.fn());
        registry.add(vi.fn());

        expect(process.listenerCount("exit")).toBe(before + 1);
        registry.runAll();
    });
});
