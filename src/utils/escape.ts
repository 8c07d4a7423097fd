/***
 *
 *  Systemd Unit Name Escaping
 *
 *  Mirrors `systemd-escape`, with and without `--path`.
 *
 */

import { InvalidEscapeError, InvalidPathError } from "../errors"

export type UnitType =
    | "service"
    | "socket"
    | "device"
    | "mount"
    | "automount"
    | "swap"
    | "target"
    | "path"
    | "timer"
    | "slice"
    | "scope"

const KEPT_CHARACTER = /^[A-Za-z0-9:_.]$/

function escapeByte(byte: number): string {
    return `\\x${byte.toString(16).padStart(2, "0")}`
}

function escapeBytes(value: string): string {
    let escaped = ""
    Buffer.from(value, "utf-8").forEach((byte, index) => {
        const character = String.fromCharCode(byte)
        if (character === "/") {
            escaped += "-"
        } else if (index === 0 && character === ".") {
            escaped += escapeByte(byte)
        } else if (byte < 0x80 && KEPT_CHARACTER.test(character)) {
            escaped += character
        } else {
            escaped += escapeByte(byte)
        }
    })
    return escaped
}

/**
 * Escapes a string for use as (part of) a unit name, e.g. `my job` becomes `my\x20job`
 */
export function systemdEscape(value: string): string {
    return escapeBytes(value)
}

/**
 * Escapes a filesystem path, e.g. `/var/lib/app` becomes `var-lib-app`
 */
export function systemdEscapePath(path: string): string {
    const components: string[] = []
    for (const component of path.split("/")) {
        if (component === "" || component === ".") continue
        if (component === "..") {
            throw new InvalidPathError(path, "path is not normalized")
        }
        components.push(component)
    }

    if (components.length === 0) {
        return "-"
    }

    return escapeBytes(components.join("/"))
}

/**
 * Reverses systemdEscape. Only `\xHH` sequences are understood.
 */
export function systemdUnescape(value: string): string {
    const bytes: number[] = []
    let index = 0

    while (index < value.length) {
        const character = String.fromCodePoint(value.codePointAt(index) ?? 0)
        if (character !== "\\") {
            bytes.push(...Buffer.from(character, "utf-8"))
            index += character.length
            continue
        }

        const hex = value.slice(index + 2, index + 4)
        if (value[index + 1] !== "x" || !/^[0-9a-fA-F]{2}$/.test(hex)) {
            throw new InvalidEscapeError(value)
        }
        bytes.push(parseInt(hex, 16))
        index += 4
    }

    return Buffer.from(bytes).toString("utf-8")
}

/**
 * Reverses systemdEscapePath, always yielding an absolute path
 */
export function systemdUnescapePath(value: string): string {
    if (value === "-") {
        return "/"
    }
    return `/${systemdUnescape(value.replace(/-/g, "/"))}`
}

export function withSuffix(name: string, type: UnitType): string {
    return `${name}.${type}`
}
