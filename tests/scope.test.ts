import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { withPidFile } from "../src/pidfile/scope.js";
import { ExitCleanup } from "../src/pidfile/cleanup.js";

describe("withPidFile", () => {
    let tempDir: string;
    let pidPath: string;
    let exitCleanup: ExitCleanup;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pidguard-scope-"));
        pidPath = path.join(tempDir, "app.pid");
        exitCleanup = new ExitCleanup({ hookProcessExit: false });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should remove an armed pid file when the scope ends", async () => {
        const result = await withPidFile({ file: pidPath, exitCleanup }, async (pidFile) => {
            expect(await pidFile.create()).toBe(true);
            pidFile.armSelfCleanup();
            expect(fs.existsSync(pidPath)).toBe(true);
            return pidFile.pid();
        });

        expect(result).toBe(process.pid);
        expect(fs.existsSync(pidPath)).toBe(false);
    });

    it("should remove an armed pid file when the scope throws", async () => {
        await expect(
            withPidFile({ file: pidPath, exitCleanup }, async (pidFile) => {
                expect(await pidFile.create()).toBe(true);
                pidFile.armSelfCleanup();
                throw new Error("boom");
            }),
        ).rejects.toThrow("boom");

        expect(fs.existsSync(pidPath)).toBe(false);
    });

    it("should leave removal to a token that outlives the scope", async () => {
        const token = await withPidFile({ file: pidPath, exitCleanup }, async (pidFile) => {
            expect(await pidFile.create()).toBe(true);
            return pidFile.detachGuardToken();
        });

        expect(fs.existsSync(pidPath)).toBe(true);
        token.dispose();
        expect(fs.existsSync(pidPath)).toBe(false);
    });

    it("should let the scope observe a token removing the file", async () => {
        await withPidFile({ file: pidPath, exitCleanup }, async (pidFile) => {
            expect(await pidFile.create()).toBe(true);
            const token = pidFile.detachGuardToken();
            expect(fs.existsSync(pidPath)).toBe(true);
            token.dispose();
            expect(fs.existsSync(pidPath)).toBe(false);
        });

        expect(fs.existsSync(pidPath)).toBe(false);
    });
});
