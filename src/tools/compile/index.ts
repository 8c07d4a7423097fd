/***
 *
 *  Compile Tool
 *
 */

import { Catalog, refOf, type Resource } from "../../catalog"
import { manageUnit, timerWrapper, tmpfile } from "../../defines"
import { Settings } from "../../settings"
import { ManifestValidator, type Manifest } from "../../types/manifest-yaml"
import { Logger } from "../../utils/log"

export interface CompileOptions {
    unitDir?: string
    tmpfilesDir?: string
}

/**
 * Declares everything in a manifest: units, then timers, then tmpfiles
 */
export function compileManifest(manifest: Manifest, options: CompileOptions = {}): Catalog {
    const catalog = new Catalog()
    const unitDir = options.unitDir ?? Settings.unitDir
    const tmpfilesDir = options.tmpfilesDir ?? Settings.tmpfilesDir

    for (const [name, unit] of Object.entries(manifest.units ?? {})) {
        manageUnit(catalog, name, {
            ensure: unit.ensure,
            path: unit.path ?? unitDir,
            mode: unit.mode,
            daemonReload: unit.daemon_reload,
            enable: unit.enable,
            active: unit.active,
            unitEntry: unit.unit_entry,
            serviceEntry: unit.service_entry,
            timerEntry: unit.timer_entry,
            pathEntry: unit.path_entry,
            socketEntry: unit.socket_entry,
            installEntry: unit.install_entry,
        })
    }

    for (const [title, timer] of Object.entries(manifest.timers ?? {})) {
        timerWrapper(catalog, title, {
            ensure: timer.ensure,
            command: timer.command,
            user: timer.user,
            onActiveSec: timer.on_active_sec,
            onBootSec: timer.on_boot_sec,
            onStartUpSec: timer.on_start_up_sec,
            onUnitActiveSec: timer.on_unit_active_sec,
            onUnitInactiveSec: timer.on_unit_inactive_sec,
            onCalendar: timer.on_calendar,
            serviceOverrides: timer.service_overrides,
            timerOverrides: timer.timer_overrides,
            serviceUnitOverrides: timer.service_unit_overrides,
            timerUnitOverrides: timer.timer_unit_overrides,
            path: unitDir,
        })
    }

    for (const [title, entry] of Object.entries(manifest.tmpfiles ?? {})) {
        tmpfile(catalog, title, {
            ensure: entry.ensure,
            content: entry.content,
            filename: entry.filename,
            path: tmpfilesDir,
        })
    }

    Logger.debug(`Compiled ${catalog.size} resources`)
    return catalog
}

export function compileManifestFile(filePath: string, options: CompileOptions = {}): Catalog {
    return compileManifest(ManifestValidator.load(filePath), options)
}

function describe(resource: Resource): string {
    switch (resource.type) {
        case "unit":
            return `${resource.ensure} ${resource.path}`
        case "file":
            return resource.ensure === "absent" ? "absent" : `file ${resource.mode}`
        case "service": {
            const state: string[] = []
            if (resource.ensure !== undefined) state.push(resource.ensure)
            if (resource.enable !== undefined) state.push(resource.enable ? "enabled" : "disabled")
            return state.length > 0 ? state.join(", ") : "unmanaged"
        }
    }
}

function planLine(resource: Resource, index: number): string {
    return `${index + 1}. ${refOf(resource)} ${describe(resource)}`
}

/**
 * One numbered line per resource, in apply order
 */
export function formatPlan(catalog: Catalog): string[] {
    return catalog.applyOrder().map(planLine)
}

/**
 * Prints the apply plan for a manifest
 */
export function compile(manifestPath: string, options: { showContent: boolean }): void {
    const catalog = compileManifestFile(manifestPath)

    for (const [index, resource] of catalog.applyOrder().entries()) {
        Logger.log(planLine(resource, index))
        if (options.showContent && resource.type !== "service" && resource.content) {
            Logger.raw(resource.content)
        }
    }

    Logger.success(`${catalog.size} resources, ${catalog.edges().length} ordering edges`)
}
