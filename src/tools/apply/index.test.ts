import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { chmod, mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { applyCatalog, DAEMON_RELOAD_REF, type ServiceManager } from "./index"
import { Catalog } from "../../catalog"
import { timerWrapper, tmpfile } from "../../defines"
import { fileExists } from "../../utils/path"

const COMMAND = "/usr/local/bin/backup"

const renames = vi.hoisted(() => ({ fail: false }))

vi.mock("node:fs/promises", async (importOriginal) => {
    const actual = await importOriginal<typeof import("node:fs/promises")>()
    return {
        ...actual,
        rename: async (from: string, to: string): Promise<void> => {
            if (renames.fail) {
                throw new Error(`rename ${from} failed`)
            }
            await actual.rename(from, to)
        },
    }
})

/**
 * In-memory stand-in for systemctl, recording every call
 */
class FakeServiceManager implements ServiceManager {
    readonly calls: string[] = []
    readonly enabled = new Set<string>()
    readonly active = new Set<string>()
    failOnStart = false

    async daemonReload(): Promise<void> {
        this.calls.push("daemon-reload")
    }

    async isActive(unit: string): Promise<boolean> {
        this.calls.push(`is-active ${unit}`)
        return this.active.has(unit)
    }

    async isEnabled(unit: string): Promise<boolean> {
        this.calls.push(`is-enabled ${unit}`)
        return this.enabled.has(unit)
    }

    async start(unit: string): Promise<void> {
        this.calls.push(`start ${unit}`)
        if (this.failOnStart) {
            throw new Error(`Job for ${unit} failed`)
        }
        this.active.add(unit)
    }

    async stop(unit: string): Promise<void> {
        this.calls.push(`stop ${unit}`)
        this.active.delete(unit)
    }

    async enable(unit: string): Promise<void> {
        this.calls.push(`enable ${unit}`)
        this.enabled.add(unit)
    }

    async disable(unit: string): Promise<void> {
        this.calls.push(`disable ${unit}`)
        this.enabled.delete(unit)
    }
}

function backupTimer(ensure: "present" | "absent"): Catalog {
    const catalog = new Catalog()
    timerWrapper(catalog, "backup", ensure === "present"
        ? { ensure, command: COMMAND, onCalendar: "daily" }
        : { ensure })
    return catalog
}

async function modeOf(path: string): Promise<number> {
    return (await stat(path)).mode & 0o777
}

describe("applyCatalog", () => {
    let root: string
    let services: FakeServiceManager

    beforeEach(async () => {
        vi.spyOn(console, "log").mockImplementation(() => {})
        root = await mkdtemp(join(tmpdir(), "sysunit-root-"))
        services = new FakeServiceManager()
    })

    afterEach(async () => {
        renames.fail = false
        vi.restoreAllMocks()
        await rm(root, { recursive: true, force: true })
    })

    it("installs a timer, reloads systemd, then enables and starts it", async () => {
        const catalog = backupTimer("present")
        const report = await applyCatalog(catalog, { root, serviceManager: services })

        expect(report.changes).toEqual([
            { ref: "Unit[backup.service]", action: "created" },
            { ref: "Unit[backup.timer]", action: "created" },
            { ref: DAEMON_RELOAD_REF, action: "reloaded" },
            { ref: "Service[backup.timer]", action: "enabled" },
            { ref: "Service[backup.timer]", action: "started" },
        ])
        expect(services.calls).toEqual([
            "daemon-reload",
            "is-enabled backup.timer",
            "enable backup.timer",
            "is-active backup.timer",
            "start backup.timer",
        ])

        const timerPath = join(root, "etc/systemd/system/backup.timer")
        const timer = catalog.get("Unit[backup.timer]")
        expect(await readFile(timerPath, "utf-8")).toBe(timer?.type === "unit" ? timer.content : "")
        expect(await modeOf(timerPath)).toBe(0o444)
    })

    it("changes nothing on a second run", async () => {
        await applyCatalog(backupTimer("present"), { root, serviceManager: services })
        services.calls.length = 0

        const report = await applyCatalog(backupTimer("present"), { root, serviceManager: services })

        expect(report.changes).toEqual([])
        expect(services.calls).toEqual(["is-enabled backup.timer", "is-active backup.timer"])
    })

    it("stops the timer before removing its units", async () => {
        await applyCatalog(backupTimer("present"), { root, serviceManager: services })
        services.calls.length = 0

        const report = await applyCatalog(backupTimer("absent"), { root, serviceManager: services })

        expect(report.changes).toEqual([
            { ref: "Service[backup.timer]", action: "disabled" },
            { ref: "Service[backup.timer]", action: "stopped" },
            { ref: "Unit[backup.timer]", action: "removed" },
            { ref: "Unit[backup.service]", action: "removed" },
            { ref: DAEMON_RELOAD_REF, action: "reloaded" },
        ])
        expect(services.calls).toEqual([
            "is-enabled backup.timer",
            "disable backup.timer",
            "is-active backup.timer",
            "stop backup.timer",
            "daemon-reload",
        ])
        expect(fileExists(join(root, "etc/systemd/system/backup.timer"))).toBe(false)
        expect(fileExists(join(root, "etc/systemd/system/backup.service"))).toBe(false)
    })

    it("only reports changes in a dry run", async () => {
        const report = await applyCatalog(backupTimer("present"), { root, serviceManager: services, dryRun: true })

        expect(report.changes.map(change => change.action)).toEqual(["created", "created", "reloaded", "enabled", "started"])
        expect(services.calls).toEqual(["is-enabled backup.timer", "is-active backup.timer"])
        expect(fileExists(join(root, "etc/systemd/system/backup.service"))).toBe(false)
    })

    it("skips service state when services are not managed", async () => {
        const report = await applyCatalog(backupTimer("present"), { root, serviceManager: services, manageServices: false })

        expect(report.changes).toEqual([
            { ref: "Unit[backup.service]", action: "created" },
            { ref: "Unit[backup.timer]", action: "created" },
            { ref: "Service[backup.timer]", action: "skipped" },
        ])
        expect(services.calls).toEqual([])
    })

    it("logs skipped services as warnings", async () => {
        await applyCatalog(backupTimer("present"), { root, serviceManager: services, manageServices: false })

        const lines = vi.mocked(console.log).mock.calls.map(call => String(call[0])).filter(line => line.includes("Service[backup.timer]"))
        expect(lines).toHaveLength(1)
        expect(lines[0]).toContain("⚠")
        expect(lines[0]).toContain("Service[backup.timer] skipped")
        expect(lines[0]).not.toContain("✓")
    })

    it("removes the staged file when it cannot be moved into place", async () => {
        renames.fail = true
        const catalog = new Catalog()
        tmpfile(catalog, "app.conf", { content: "d /run/app" })

        await expect(applyCatalog(catalog, { root, serviceManager: services })).rejects.toThrow("failed")
        expect(await readdir(join(root, "etc/tmpfiles.d"))).toEqual([])
    })

    it("writes and updates tmpfiles", async () => {
        const first = new Catalog()
        tmpfile(first, "random_tmpfile.conf", { content: "random stuff" })
        const created = await applyCatalog(first, { root, serviceManager: services })

        const path = join(root, "etc/tmpfiles.d/random_tmpfile.conf")
        expect(created.changes).toEqual([{ ref: "File[/etc/tmpfiles.d/random_tmpfile.conf]", action: "created" }])
        expect(await readFile(path, "utf-8")).toBe("random stuff")
        expect(await modeOf(path)).toBe(0o444)

        const second = new Catalog()
        tmpfile(second, "random_tmpfile.conf", { content: "other stuff" })
        const updated = await applyCatalog(second, { root, serviceManager: services })

        expect(updated.changes).toEqual([{ ref: "File[/etc/tmpfiles.d/random_tmpfile.conf]", action: "updated" }])
        expect(await readFile(path, "utf-8")).toBe("other stuff")
        expect(services.calls).toEqual([])
    })

    it("corrects the mode of an otherwise unchanged file", async () => {
        const path = join(root, "etc/tmpfiles.d/app.conf")
        await mkdir(join(root, "etc/tmpfiles.d"), { recursive: true })
        await writeFile(path, "d /run/app")
        await chmod(path, 0o644)

        const catalog = new Catalog()
        tmpfile(catalog, "app.conf", { content: "d /run/app" })
        const report = await applyCatalog(catalog, { root, serviceManager: services })

        expect(report.changes).toEqual([{ ref: "File[/etc/tmpfiles.d/app.conf]", action: "updated" }])
        expect(await modeOf(path)).toBe(0o444)
    })

    it("propagates service manager failures", async () => {
        services.failOnStart = true

        await expect(applyCatalog(backupTimer("present"), { root, serviceManager: services }))
            .rejects.toThrow("Job for backup.timer failed")
    })
})
