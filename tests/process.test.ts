import { describe, it, expect } from "vitest";
import { errorCode, isProcessRunning } from "../src/pidfile/process.js";

describe("Process probe", () => {
    describe("isProcessRunning", () => {
        it("should return true for the current process", () => {
            expect(isProcessRunning(process.pid)).toBe(true);
        });

        it("should return false for a non-existent PID", () => {
            // Use a very high PID unlikely to exist
            expect(isProcessRunning(999999)).toBe(false);
        });

        it("should never probe process groups", () => {
            expect(isProcessRunning(0)).toBe(false);
            expect(isProcessRunning(-1)).toBe(false);
            expect(isProcessRunning(1.5)).toBe(false);
        });
    });

    describe("errorCode", () => {
        it("should read the code of a system error", () => {
            const err = Object.assign(new Error("missing"), { code: "ENOENT" });
            expect(errorCode(err)).toBe("ENOENT");
        });

        it("should return undefined for anything else", () => {
            expect(errorCode(new Error("plain"))).toBeUndefined();
            expect(errorCode("ENOENT")).toBeUndefined();
            expect(errorCode({ code: 42 })).toBeUndefined();
        });
    });
});
