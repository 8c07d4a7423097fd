/***
 *
 *
 *  tmpfiles.d Drop-in Declaration
 *
 */

import { posix } from "node:path"
import type { Catalog, ResourceRef } from "../catalog"
import { InvalidDropinNameError } from "../errors"
import { DEFAULT_TMPFILES_DIR } from "../settings"
import { DROPIN_PATTERN } from "../types/unit"

export const TMPFILE_MODE = "0444"

export interface TmpfileParams {
    ensure?: "file" | "present" | "absent"
    content?: string
    // Overrides the title as the drop-in's filename
    filename?: string
    path?: string
}

/**
 * Declares `${path}/${filename ?? title}`. The resolved name has to be a
 * drop-in name; when `filename` is given the title is not checked.
 */
export function tmpfile(catalog: Catalog, title: string, params: TmpfileParams = {}): ResourceRef {
    const resource = `Tmpfile[${title}]`
    const filename = params.filename ?? title

    if (!DROPIN_PATTERN.test(filename)) {
        throw new InvalidDropinNameError(resource, filename, params.filename === undefined ? "title" : "filename")
    }

    return catalog.add({
        type: "file",
        title: posix.join(params.path ?? DEFAULT_TMPFILES_DIR, filename),
        ensure: params.ensure === "absent" ? "absent" : "file",
        content: params.content ?? "",
        mode: TMPFILE_MODE,
    })
}
