import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { defaultPidFilePath, resolvePidFilePath } from "../src/pidfile/paths.js";

describe("Pid file paths", () => {
    it("should append .pid to the full program file name", () => {
        expect(defaultPidFilePath("/srv/app/server.js")).toBe(path.resolve("/srv/app/server.js.pid"));
    });

    it("should resolve a relative program path against the working directory", () => {
        expect(defaultPidFilePath("bin/tool")).toBe(path.resolve("bin/tool.pid"));
    });

    it("should fall back to the default for an empty value", () => {
        expect(resolvePidFilePath("", "/srv/app/server.js")).toBe(path.resolve("/srv/app/server.js.pid"));
        expect(resolvePidFilePath(undefined, "/srv/app/server.js")).toBe(path.resolve("/srv/app/server.js.pid"));
    });

    it("should anchor relative values to the program directory, not the cwd", () => {
        expect(resolvePidFilePath("../run/app.pid", "/srv/app/server.js")).toBe(path.resolve("/srv/run/app.pid"));
    });

    it("should prefer an explicit base directory", () => {
        expect(resolvePidFilePath("app.pid", "/srv/app/server.js", "/var/run")).toBe(path.resolve("/var/run/app.pid"));
    });

    it("should normalize absolute values", () => {
        expect(resolvePidFilePath("/var/run/../run/app.pid", "/srv/app/server.js")).toBe(path.normalize("/var/run/app.pid"));
    });
});
