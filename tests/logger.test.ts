import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { Logger } from "../src/runner/logger.js";

describe("Logger", () => {
    let logDir: string;

    beforeEach(() => {
        logDir = fs.mkdtempSync(path.join(os.tmpdir(), "pidguard-logs-"));
    });

    afterEach(() => {
        fs.rmSync(logDir, { recursive: true, force: true });
    });

    it("should write timestamped lines with their level", () => {
        const logger = new Logger({ logDir });
        logger.info("started");
        logger.warn("careful");
        logger.error("failed");

        const lines = fs.readFileSync(logger.getLogFilePath(), "utf-8").trimEnd().split("\n");
        expect(logger.getLogFilePath()).toBe(path.join(logDir, "pidguard.log"));
        expect(lines).toHaveLength(3);
        expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] started$/);
        expect(lines[1]).toMatch(/\] \[WARN\] careful$/);
        expect(lines[2]).toMatch(/\] \[ERROR\] failed$/);
    });

    it("should rotate the log once it reaches the size limit", () => {
        // ~10 bytes: every existing log is over the limit
        const logger = new Logger({ logDir, maxLogSizeMB: 0.00001, maxLogFiles: 3 });
        logger.info("one");
        logger.info("two");
        logger.info("three");

        expect(fs.readFileSync(path.join(logDir, "pidguard.log"), "utf-8")).toContain("[INFO] three");
        expect(fs.readFileSync(path.join(logDir, "pidguard.1.log"), "utf-8")).toContain("[INFO] two");
        expect(fs.readFileSync(path.join(logDir, "pidguard.2.log"), "utf-8")).toContain("[INFO] one");
    });

    it("should drop the oldest rotated log", () => {
        const logger = new Logger({ logDir, maxLogSizeMB: 0.00001, maxLogFiles: 2 });
        logger.info("one");
        logger.info("two");
        logger.info("three");

        expect(fs.existsSync(path.join(logDir, "pidguard.2.log"))).toBe(false);
        expect(fs.readFileSync(path.join(logDir, "pidguard.1.log"), "utf-8")).toContain("[INFO] two");
    });
});
