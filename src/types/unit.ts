/***
 *
 *
 *  Unit Entry Types
 *
 */

export type Ensure = "present" | "absent"

export type DirectiveScalar = string | number | boolean

/**
 * Arrays render as one `Key=value` line per element
 */
export type DirectiveValue = DirectiveScalar | DirectiveScalar[]

export type UnitEntry = Record<string, DirectiveValue>

export type SectionName = "Unit" | "Service" | "Timer" | "Path" | "Socket" | "Install"

export type UnitSections = Partial<Record<SectionName, UnitEntry>>

export const UNIT_NAME_PATTERN = /^[a-zA-Z0-9:\-_.\\@%]+\.(service|socket|device|mount|automount|swap|target|path|timer|slice|scope)$/

// NAME.conf, including numerically prefixed forms such as 10-NAME.conf
export const DROPIN_PATTERN = /^[^/]+\.conf$/

/**
 * Drops keys whose value is undefined
 */
export function compactEntry(entry: Record<string, DirectiveValue | undefined>): UnitEntry {
    const compacted: UnitEntry = {}
    for (const [key, value] of Object.entries(entry)) {
        if (value !== undefined) {
            compacted[key] = value
        }
    }
    return compacted
}

/**
 * Right-biased merge: overrides win on collision
 */
export function mergeEntries(defaults: UnitEntry, overrides?: UnitEntry): UnitEntry {
    return { ...defaults, ...(overrides ?? {}) }
}

export function isEmptyEntry(entry: UnitEntry | undefined): boolean {
    return entry === undefined || Object.keys(entry).length === 0
}
