#!/usr/bin/env node
/***
 *
 *
 *  Main Entry Point for the Application
 *
 */

import { Command } from "commander"
import { Settings } from "./settings"
import { Logger } from "./utils/log"
import { systemdEscape, systemdEscapePath, systemdUnescape, systemdUnescapePath, withSuffix, type UnitType } from "./utils/escape"
import { compile } from "./tools/compile"
import { apply } from "./tools/apply"
import { SYSUNIT_VERSION } from "./version"

const UNIT_TYPES: readonly UnitType[] = ["service", "socket", "device", "mount", "automount", "swap", "target", "path", "timer", "slice", "scope"]

function isUnitType(value: string): value is UnitType {
    return UNIT_TYPES.some(type => type === value)
}

function fail(prefix: string, err: unknown): never {
    Logger.error(`${prefix}: ${err instanceof Error ? err.message : String(err)}`)
    process.exit(1)
}

const program = new Command()

program
    .name("sysunit")
    .description("Declare systemd timers, unit files and tmpfiles.d drop-ins from a manifest")
    .version(SYSUNIT_VERSION)
    .option("--verbose", "Enable verbose output")
    .hook("preAction", (thisCommand) => {
        const opts = thisCommand.opts()
        if (opts.verbose) {
            Settings.verbose = true
        }
    })

program.command("compile")
    .argument("<manifest>", "Path to the manifest YAML")
    .option("--show-content", "Print the rendered content of every file")
    .description("Compile a manifest and print the resources in apply order")
    .action((manifest: string, options: { showContent?: boolean }) => {
        try {
            Logger.title(`Compiling ${manifest}`)
            compile(manifest, { showContent: options.showContent ?? false })
        } catch (err) {
            fail("Compile failed", err)
        }
    })

program.command("apply")
    .argument("<manifest>", "Path to the manifest YAML")
    .option("--root <dir>", "Filesystem root to place files under")
    .option("--dry-run", "Report changes without making them")
    .option("--skip-services", "Do not touch service state or reload systemd")
    .description("Compile a manifest and apply it")
    .action(async (manifest: string, options: { root?: string; dryRun?: boolean; skipServices?: boolean }) => {
        try {
            Logger.title(`Applying ${manifest}`)
            await apply(manifest, {
                root: options.root,
                dryRun: options.dryRun ?? false,
                skipServices: options.skipServices ?? false,
            })
        } catch (err) {
            fail("Apply failed", err)
        }
    })

program.command("escape")
    .argument("<value>", "String to escape")
    .option("--path", "Treat the value as a filesystem path")
    .option("-u, --unescape", "Reverse the escaping")
    .option("--suffix <type>", "Append a unit type suffix, e.g. service")
    .description("Escape a string for use in a systemd unit name")
    .action((value: string, options: { path?: boolean; unescape?: boolean; suffix?: string }) => {
        try {
            if (options.unescape) {
                console.log(options.path ? systemdUnescapePath(value) : systemdUnescape(value))
                return
            }

            const escaped = options.path ? systemdEscapePath(value) : systemdEscape(value)
            if (options.suffix === undefined) {
                console.log(escaped)
            } else if (isUnitType(options.suffix)) {
                console.log(withSuffix(escaped, options.suffix))
            } else {
                fail("Escape failed", new Error(`Invalid suffix: ${options.suffix}. Must be one of: ${UNIT_TYPES.join(", ")}`))
            }
        } catch (err) {
            fail("Escape failed", err)
        }
    })

program.parseAsync().catch((err: unknown) => fail("sysunit", err))
