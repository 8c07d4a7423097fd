/***
 *
 *
 *  Manifest YAML Validation Schema
 *
 */

import { z } from "zod"
import { readFileSync } from "node:fs"
import { parse } from "yaml"
import { ManifestError } from "../errors"
import { fileExists } from "../utils/path"

const DirectiveScalarSchema = z.union([z.string(), z.number(), z.boolean()])

const DirectiveValueSchema = z.union([DirectiveScalarSchema, z.array(DirectiveScalarSchema)])

// Directive name -> value, for one unit section
const UnitEntrySchema = z.record(z.string(), DirectiveValueSchema)

const TimespanValueSchema = z.union([z.string().min(1), z.number().int().nonnegative()])

const TimespanSchema = z.union([TimespanValueSchema, z.array(TimespanValueSchema).min(1)])

const EnsureSchema = z.enum(["present", "absent"])

const ModeSchema = z.string().regex(/^[0-7]{3,4}$/, "Mode must be an octal permission string such as 0444")

// Managed unit file schema
const UnitSchema = z.object({
    ensure: EnsureSchema.optional(),
    path: z.string().startsWith("/", "Path must be absolute").optional(),
    mode: ModeSchema.optional(),
    daemon_reload: z.boolean().optional(),
    enable: z.boolean().optional(),
    active: z.boolean().optional(),
    unit_entry: UnitEntrySchema.optional(),
    service_entry: UnitEntrySchema.optional(),
    timer_entry: UnitEntrySchema.optional(),
    path_entry: UnitEntrySchema.optional(),
    socket_entry: UnitEntrySchema.optional(),
    install_entry: UnitEntrySchema.optional(),
}).strict()

// Timer wrapper schema
const TimerSchema = z.object({
    ensure: EnsureSchema.default("present"),
    command: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    on_active_sec: TimespanSchema.optional(),
    on_boot_sec: TimespanSchema.optional(),
    on_start_up_sec: TimespanSchema.optional(),
    on_unit_active_sec: TimespanSchema.optional(),
    on_unit_inactive_sec: TimespanSchema.optional(),
    on_calendar: TimespanSchema.optional(),
    service_overrides: UnitEntrySchema.optional(),
    timer_overrides: UnitEntrySchema.optional(),
    service_unit_overrides: UnitEntrySchema.optional(),
    timer_unit_overrides: UnitEntrySchema.optional(),
}).strict()

// tmpfiles.d drop-in schema
const TmpfileSchema = z.object({
    ensure: z.enum(["file", "present", "absent"]).optional(),
    content: z.string().optional(),
    filename: z.string().min(1).optional(),
}).strict()

// Manifest file schema
export const ManifestSchema = z.object({
    // A bare `timers:` key parses to null
    units: z.record(z.string(), UnitSchema).nullish(),
    timers: z.record(z.string(), TimerSchema).nullish(),
    tmpfiles: z.record(z.string(), TmpfileSchema).nullish(),
}).strict()

export type Manifest = z.infer<typeof ManifestSchema>
export type ManifestUnit = z.infer<typeof UnitSchema>
export type ManifestTimer = z.infer<typeof TimerSchema>
export type ManifestTmpfile = z.infer<typeof TmpfileSchema>

export class ManifestValidator {

    public static schema = ManifestSchema

    /**
     * Validates a manifest file and returns true if valid, false otherwise
     */
    public static validate(filePath: string): boolean {
        return this.safeValidate(filePath).success
    }

    /**
     * Safely validates a manifest file and returns a result object
     */
    public static safeValidate(filePath: string): {
        success: boolean
        data?: Manifest
        error?: z.ZodError | Error
    } {
        if (!fileExists(filePath)) {
            return {
                success: false,
                error: new Error(`Manifest file not found: ${filePath}`),
            }
        }

        try {
            const parsed: unknown = parse(readFileSync(filePath, "utf-8")) ?? {}
            const result = ManifestSchema.safeParse(parsed)

            if (result.success) {
                return { success: true, data: result.data }
            }

            return { success: false, error: result.error }
        } catch (error) {
            return {
                success: false,
                error: error instanceof Error
                    ? error
                    : new Error(`Failed to parse YAML: ${String(error)}`),
            }
        }
    }

    /**
     * Parses manifest YAML, throwing a ManifestError listing every issue
     */
    public static parse(content: string, source = "manifest"): Manifest {
        let parsed: unknown
        try {
            parsed = parse(content) ?? {}
        } catch (error) {
            throw new ManifestError(source, [], error instanceof Error ? error : new Error(String(error)))
        }

        const result = ManifestSchema.safeParse(parsed)
        if (!result.success) {
            throw new ManifestError(source, result.error.issues)
        }
        return result.data
    }

    /**
     * Reads and validates a manifest file
     */
    public static load(filePath: string): Manifest {
        if (!fileExists(filePath)) {
            throw new ManifestError(filePath, [], new Error("file not found"))
        }
        return this.parse(readFileSync(filePath, "utf-8"), filePath)
    }
}
