/***
 *
 *
 *  Error Types
 *
 *  Everything raised while compiling declarations. None of these are
 *  recoverable: a failing declaration aborts the whole catalog.
 *
 */

import type { z } from "zod"

/**
 * A declaration was given parameters it cannot be compiled from.
 * `resource` names the offending declaration, e.g. `Timer_wrapper[backup]`.
 */
export class DeclarationError extends Error {
    constructor(readonly resource: string, message: string) {
        super(`${resource}: ${message}`)
        this.name = "DeclarationError"
    }
}

export class MissingTriggerError extends DeclarationError {
    constructor(resource: string) {
        super(resource, "at least one of on_active_sec, on_boot_sec, on_start_up_sec, on_unit_active_sec, on_unit_inactive_sec or on_calendar must be set")
        this.name = "MissingTriggerError"
    }
}

export class MissingCommandError extends DeclarationError {
    constructor(resource: string) {
        super(resource, "command must be set when ensure is present")
        this.name = "MissingCommandError"
    }
}

export class InvalidDropinNameError extends DeclarationError {
    constructor(resource: string, readonly filename: string, parameter: "title" | "filename") {
        super(resource, `${parameter} expects a match for a drop-in name (NAME.conf), got '${filename}'`)
        this.name = "InvalidDropinNameError"
    }
}

export class InvalidUnitNameError extends DeclarationError {
    constructor(resource: string, readonly unitName: string) {
        super(resource, `'${unitName}' is not a valid systemd unit name`)
        this.name = "InvalidUnitNameError"
    }
}

export class UnitEntryError extends DeclarationError {
    constructor(resource: string, message: string) {
        super(resource, message)
        this.name = "UnitEntryError"
    }
}

export class InvalidDirectiveError extends DeclarationError {
    constructor(resource: string, readonly section: string, readonly directive: string, message: string) {
        super(resource, `[${section}] ${directive}: ${message}`)
        this.name = "InvalidDirectiveError"
    }
}

export class DuplicateResourceError extends Error {
    constructor(readonly ref: string) {
        super(`Duplicate declaration: ${ref} is already declared`)
        this.name = "DuplicateResourceError"
    }
}

export class UnknownResourceError extends Error {
    constructor(readonly ref: string) {
        super(`Could not find resource '${ref}' for relationship`)
        this.name = "UnknownResourceError"
    }
}

export class DependencyCycleError extends Error {
    constructor(readonly refs: string[]) {
        super(`Found 1 dependency cycle: (${refs.join(" => ")})`)
        this.name = "DependencyCycleError"
    }
}

export class InvalidPathError extends Error {
    constructor(readonly path: string, reason: string) {
        super(`Cannot escape path '${path}': ${reason}`)
        this.name = "InvalidPathError"
    }
}

export class InvalidEscapeError extends Error {
    constructor(readonly value: string) {
        super(`Invalid escape sequence in '${value}'`)
        this.name = "InvalidEscapeError"
    }
}

export class ManifestError extends Error {
    constructor(readonly file: string, readonly issues: z.ZodIssue[] = [], cause?: Error) {
        super(
            issues.length > 0
                ? `${file} validation failed:\n${issues.map(formatIssue).join("\n")}`
                : `Failed to load ${file}${cause ? `: ${cause.message}` : ""}`
        )
        this.name = "ManifestError"
    }
}

export function formatIssue(issue: z.ZodIssue): string {
    const path = issue.path.join(".")
    return path ? `  ${path}: ${issue.message}` : `  ${issue.message}`
}
