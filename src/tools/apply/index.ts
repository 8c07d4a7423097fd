/***
 *
 *  Apply Tool
 *
 *  Walks a compiled catalog in dependency order and brings the filesystem
 *  and the service manager in line with it, one resource at a time.
 *
 */

import { dirname } from "node:path"
import { chmod, mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import { refOf, type Catalog, type FileResource, type ServiceResource, type UnitResource } from "../../catalog"
import { Settings } from "../../settings"
import { Logger } from "../../utils/log"
import { underRoot } from "../../utils/path"
import { compileManifestFile } from "../compile"
import { SystemctlServiceManager, type ServiceManager } from "./service-manager"

export * from "./service-manager"

export type ChangeAction =
    | "created"
    | "updated"
    | "removed"
    | "enabled"
    | "disabled"
    | "started"
    | "stopped"
    | "reloaded"
    | "skipped"

export interface Change {
    ref: string
    action: ChangeAction
}

export interface ApplyReport {
    changes: Change[]
}

export interface ApplyOptions {
    root: string
    serviceManager: ServiceManager
    // Report what would change without writing files or changing service state
    dryRun?: boolean
    // When false, service resources and daemon reloads are skipped
    manageServices?: boolean
}

// Stands for the daemon-reload that follows unit file changes
export const DAEMON_RELOAD_REF = "Exec[systemctl daemon-reload]"

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error
}

async function readExisting(target: string): Promise<string | null> {
    try {
        return await readFile(target, "utf-8")
    } catch (error) {
        if (isErrnoException(error) && error.code === "ENOENT") {
            return null
        }
        throw error
    }
}

async function currentMode(target: string): Promise<number> {
    const stats = await stat(target)
    return stats.mode & 0o7777
}

/**
 * Writes content with the given octal mode, replacing any existing file
 * through a rename so a read-only mode never blocks an update
 */
async function syncFile(target: string, content: string, mode: string, dryRun: boolean): Promise<"created" | "updated" | null> {
    const wantedMode = parseInt(mode, 8)
    const existing = await readExisting(target)

    if (existing === content && (await currentMode(target)) === wantedMode) {
        return null
    }

    if (!dryRun) {
        await mkdir(dirname(target), { recursive: true })
        const staging = `${target}.sysunit-new`
        try {
            await writeFile(staging, content, "utf-8")
            await chmod(staging, wantedMode)
            await rename(staging, target)
        } catch (error) {
            await rm(staging, { force: true })
            throw error
        }
    }

    return existing === null ? "created" : "updated"
}

async function removeFile(target: string, dryRun: boolean): Promise<"removed" | null> {
    if ((await readExisting(target)) === null) {
        return null
    }
    if (!dryRun) {
        await rm(target, { force: true })
    }
    return "removed"
}

class CatalogApplier {

    private readonly changes: Change[] = []
    private reloadPending = false
    private readonly dryRun: boolean
    private readonly manageServices: boolean

    constructor(private readonly options: ApplyOptions) {
        this.dryRun = options.dryRun ?? false
        this.manageServices = options.manageServices ?? true
    }

    private record(ref: string, action: ChangeAction): void {
        this.changes.push({ ref, action })
        const verb = this.dryRun ? `would be ${action}` : action
        if (action === "skipped") {
            Logger.warning(`${ref} ${verb}`)
        } else {
            Logger.success(`${ref} ${verb}`)
        }
    }

    private async applyUnit(resource: UnitResource): Promise<void> {
        const target = underRoot(this.options.root, resource.path)
        const action = resource.ensure === "present"
            ? await syncFile(target, resource.content, resource.mode, this.dryRun)
            : await removeFile(target, this.dryRun)

        if (action === null) {
            Logger.unchanged(refOf(resource))
            return
        }

        this.record(refOf(resource), action)
        if (resource.daemonReload) {
            this.reloadPending = true
        }
    }

    private async applyFile(resource: FileResource): Promise<void> {
        const target = underRoot(this.options.root, resource.title)
        const action = resource.ensure === "file"
            ? await syncFile(target, resource.content, resource.mode, this.dryRun)
            : await removeFile(target, this.dryRun)

        if (action === null) {
            Logger.unchanged(refOf(resource))
            return
        }

        this.record(refOf(resource), action)
    }

    private async flushReload(): Promise<void> {
        if (!this.reloadPending || !this.manageServices) return

        if (!this.dryRun) {
            await this.options.serviceManager.daemonReload()
        }
        this.reloadPending = false
        this.record(DAEMON_RELOAD_REF, "reloaded")
    }

    private async applyService(resource: ServiceResource): Promise<void> {
        const key = refOf(resource)
        if (!this.manageServices) {
            this.record(key, "skipped")
            return
        }

        // Units written earlier in this run must be loaded before they can be enabled
        await this.flushReload()

        const manager = this.options.serviceManager
        const unit = resource.title
        let changed = false

        if (resource.enable !== undefined && (await manager.isEnabled(unit)) !== resource.enable) {
            if (!this.dryRun) {
                await (resource.enable ? manager.enable(unit) : manager.disable(unit))
            }
            this.record(key, resource.enable ? "enabled" : "disabled")
            changed = true
        }

        if (resource.ensure !== undefined) {
            const running = resource.ensure === "running"
            if ((await manager.isActive(unit)) !== running) {
                if (!this.dryRun) {
                    await (running ? manager.start(unit) : manager.stop(unit))
                }
                this.record(key, running ? "started" : "stopped")
                changed = true
            }
        }

        if (!changed) {
            Logger.unchanged(key)
        }
    }

    public async apply(catalog: Catalog): Promise<ApplyReport> {
        for (const resource of catalog.applyOrder()) {
            Logger.debug(`Applying ${refOf(resource)}`)
            switch (resource.type) {
                case "unit":
                    await this.applyUnit(resource)
                    break
                case "file":
                    await this.applyFile(resource)
                    break
                case "service":
                    await this.applyService(resource)
                    break
            }
        }

        await this.flushReload()
        return { changes: this.changes }
    }

}

/**
 * Applies every resource in the catalog serially. Failures from the
 * filesystem or the service manager propagate as they are.
 */
export function applyCatalog(catalog: Catalog, options: ApplyOptions): Promise<ApplyReport> {
    return new CatalogApplier(options).apply(catalog)
}

export interface ApplyCommandOptions {
    root?: string
    dryRun: boolean
    skipServices: boolean
}

/**
 * Compiles a manifest and applies it to the configured root
 */
export async function apply(manifestPath: string, options: ApplyCommandOptions): Promise<ApplyReport> {
    const root = options.root ?? Settings.root
    const catalog = compileManifestFile(manifestPath)

    // systemctl only ever talks to the running system
    let manageServices = !options.skipServices
    if (manageServices && root !== "/") {
        Logger.warning(`Root is ${root}, skipping service state and daemon reloads`)
        manageServices = false
    }

    const report = await applyCatalog(catalog, {
        root,
        serviceManager: new SystemctlServiceManager(),
        dryRun: options.dryRun,
        manageServices,
    })

    if (report.changes.length === 0) {
        Logger.success("Everything is up to date")
    } else {
        Logger.success(`${report.changes.length} change(s) ${options.dryRun ? "pending" : "applied"}`)
    }

    return report
}
