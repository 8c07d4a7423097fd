/***
 *
 *
 *  Systemd Unit File Rendering
 *
 */

import { InvalidDirectiveError } from "../../errors"
import type { DirectiveScalar, SectionName, UnitEntry, UnitSections } from "../../types/unit"

export const UNIT_FILE_HEADER = "# Managed by sysunit. Local changes will be overwritten."

export const SECTION_ORDER: readonly SectionName[] = ["Unit", "Service", "Timer", "Path", "Socket", "Install"]

const DIRECTIVE_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/

function formatValue(value: DirectiveScalar): string {
    if (typeof value === "boolean") {
        return value ? "true" : "false"
    }
    return String(value)
}

function renderSection(resource: string, section: SectionName, entry: UnitEntry): string[] {
    const lines = [`[${section}]`]

    for (const [directive, value] of Object.entries(entry)) {
        if (!DIRECTIVE_NAME.test(directive)) {
            throw new InvalidDirectiveError(resource, section, directive, "not a valid directive name")
        }

        const values = Array.isArray(value) ? value : [value]
        for (const item of values) {
            const formatted = formatValue(item)
            if (/[\r\n]/.test(formatted)) {
                throw new InvalidDirectiveError(resource, section, directive, "values cannot span multiple lines")
            }
            lines.push(`${directive}=${formatted}`)
        }
    }

    return lines
}

/**
 * Renders unit sections to the INI text systemd reads. Sections come out in
 * a fixed order and empty ones are left out.
 */
export function renderUnitFile(sections: UnitSections, resource = "Unit"): string {
    const lines = [UNIT_FILE_HEADER, ""]

    for (const section of SECTION_ORDER) {
        const entry = sections[section]
        if (entry === undefined || Object.keys(entry).length === 0) continue

        lines.push(...renderSection(resource, section, entry), "")
    }

    return lines.join("\n")
}
