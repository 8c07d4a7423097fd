/***
 *
 *
 *  Managed Unit Declaration
 *
 *  Declares a single unit file from its sections, plus optionally the
 *  enable/active state of the unit.
 *
 */

import { posix } from "node:path"
import type { Catalog, ResourceRef } from "../catalog"
import { InvalidUnitNameError, UnitEntryError } from "../errors"
import { renderUnitFile } from "../files/systemd/unit-file"
import type { UnitType } from "../utils/escape"
import { DEFAULT_UNIT_DIR } from "../settings"
import { UNIT_NAME_PATTERN, type Ensure, type UnitEntry, type UnitSections } from "../types/unit"

export const UNIT_FILE_MODE = "0444"

export interface ManageUnitParams {
    ensure?: Ensure
    path?: string
    mode?: string
    daemonReload?: boolean
    unitEntry?: UnitEntry
    serviceEntry?: UnitEntry
    timerEntry?: UnitEntry
    pathEntry?: UnitEntry
    socketEntry?: UnitEntry
    installEntry?: UnitEntry
    enable?: boolean
    active?: boolean
}

export interface ManageUnitResult {
    unit: ResourceRef
    service?: ResourceRef
}

// Entries that only belong in a unit of the matching type
const TYPED_ENTRIES: ReadonlyArray<{ parameter: "serviceEntry" | "timerEntry" | "pathEntry" | "socketEntry"; type: UnitType }> = [
    { parameter: "serviceEntry", type: "service" },
    { parameter: "timerEntry", type: "timer" },
    { parameter: "pathEntry", type: "path" },
    { parameter: "socketEntry", type: "socket" },
]

export function manageUnit(catalog: Catalog, name: string, params: ManageUnitParams = {}): ManageUnitResult {
    const resource = `Manage_unit[${name}]`
    const ensure = params.ensure ?? "present"

    const match = UNIT_NAME_PATTERN.exec(name)
    if (!match) {
        throw new InvalidUnitNameError(resource, name)
    }
    const unitType = match[1]

    const sections: UnitSections = {
        Unit: params.unitEntry,
        Service: params.serviceEntry,
        Timer: params.timerEntry,
        Path: params.pathEntry,
        Socket: params.socketEntry,
        Install: params.installEntry,
    }

    for (const { parameter, type } of TYPED_ENTRIES) {
        if (params[parameter] !== undefined && unitType !== type) {
            throw new UnitEntryError(resource, `${parameter} is only valid for ${type} units`)
        }
    }

    if (ensure === "present" && unitType === "service" && params.serviceEntry === undefined) {
        throw new UnitEntryError(resource, "serviceEntry is required for service units")
    }

    const unit = catalog.add({
        type: "unit",
        title: name,
        ensure,
        path: posix.join(params.path ?? DEFAULT_UNIT_DIR, name),
        content: ensure === "present" ? renderUnitFile(sections, resource) : "",
        mode: params.mode ?? UNIT_FILE_MODE,
        daemonReload: params.daemonReload ?? true,
    })

    if (params.enable === undefined && params.active === undefined) {
        return { unit }
    }

    const service = catalog.add({
        type: "service",
        title: name,
        ensure: params.active === undefined ? undefined : params.active ? "running" : "stopped",
        enable: params.enable,
    })

    // The unit file has to exist before it can be started, and the unit
    // has to be stopped before its file goes away
    if (ensure === "present") {
        catalog.order(unit, service)
    } else {
        catalog.order(service, unit)
    }

    return { unit, service }
}
