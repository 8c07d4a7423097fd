/***
 *
 *
 *  Timer Wrapper Declaration
 *
 *  Expands a command and a schedule into a oneshot service unit, the timer
 *  unit that triggers it, and the enable/run state of the timer.
 *
 */

import type { Catalog, ResourceRef } from "../catalog"
import { MissingCommandError, MissingTriggerError } from "../errors"
import { systemdEscape, withSuffix } from "../utils/escape"
import { Logger } from "../utils/log"
import { compactEntry, isEmptyEntry, mergeEntries, type Ensure, type UnitEntry } from "../types/unit"
import { manageUnit } from "./manage-unit"

export type Timespan = string | number | Array<string | number>

export interface TimerWrapperParams {
    ensure: Ensure
    command?: string
    user?: string
    onActiveSec?: Timespan
    onBootSec?: Timespan
    onStartUpSec?: Timespan
    onUnitActiveSec?: Timespan
    onUnitInactiveSec?: Timespan
    onCalendar?: Timespan
    serviceOverrides?: UnitEntry
    timerOverrides?: UnitEntry
    serviceUnitOverrides?: UnitEntry
    timerUnitOverrides?: UnitEntry
    // Directory the unit files are placed in
    path?: string
}

export interface TimerWrapperResult {
    unitName: string
    service: ResourceRef
    timer: ResourceRef
    enablement: ResourceRef
}

export const TIMER_INSTALL_ENTRY: UnitEntry = { WantedBy: "timers.target" }

// An empty list renders no directive, so it does not count as a trigger
function scheduled(value: Timespan | undefined): Timespan | undefined {
    return Array.isArray(value) && value.length === 0 ? undefined : value
}

export function timerWrapper(catalog: Catalog, title: string, params: TimerWrapperParams): TimerWrapperResult {
    const resource = `Timer_wrapper[${title}]`
    const { ensure } = params

    const timerSpec = compactEntry({
        OnActiveSec: scheduled(params.onActiveSec),
        OnBootSec: scheduled(params.onBootSec),
        OnStartUpSec: scheduled(params.onStartUpSec),
        OnUnitActiveSec: scheduled(params.onUnitActiveSec),
        OnUnitInactiveSec: scheduled(params.onUnitInactiveSec),
        OnCalendar: scheduled(params.onCalendar),
    })

    if (ensure === "present") {
        if (isEmptyEntry(timerSpec)) {
            throw new MissingTriggerError(resource)
        }
        if (params.command === undefined) {
            throw new MissingCommandError(resource)
        }
    }

    const serviceSpec = compactEntry({
        ExecStart: params.command,
        User: params.user,
        Type: "oneshot",
    })

    const unitName = systemdEscape(title)
    const serviceName = withSuffix(unitName, "service")
    const timerName = withSuffix(unitName, "timer")

    Logger.debug(`Declaring ${resource} as ${serviceName} + ${timerName} (${ensure})`)

    const { unit: service } = manageUnit(catalog, serviceName, {
        ensure,
        path: params.path,
        unitEntry: isEmptyEntry(params.serviceUnitOverrides) ? undefined : params.serviceUnitOverrides,
        serviceEntry: mergeEntries(serviceSpec, params.serviceOverrides),
    })

    const { unit: timer } = manageUnit(catalog, timerName, {
        ensure,
        path: params.path,
        unitEntry: isEmptyEntry(params.timerUnitOverrides) ? undefined : params.timerUnitOverrides,
        timerEntry: mergeEntries(timerSpec, params.timerOverrides),
        installEntry: TIMER_INSTALL_ENTRY,
    })

    const running = ensure === "present"
    const enablement = catalog.add({
        type: "service",
        title: timerName,
        ensure: running ? "running" : "stopped",
        enable: running,
    })

    if (running) {
        catalog.chain(service, timer, enablement)
    } else {
        // Stop and disable the timer before its unit files are removed
        catalog.chain(enablement, timer, service)
    }

    return { unitName, service, timer, enablement }
}
