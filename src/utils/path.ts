/***
 *
 *  Path Utility Functions
 *
 */

import { statSync } from "node:fs"
import { join, isAbsolute } from "node:path"

// Checks if a File Exists
export function fileExists(path: string): boolean {
    try {
        const stats = statSync(path)
        return stats.isFile()
    } catch {
        return false
    }
}

/**
 * Resolves a managed absolute path (e.g. /etc/tmpfiles.d/x.conf) beneath a root prefix
 */
export function underRoot(root: string, managedPath: string): string {
    if (!isAbsolute(managedPath)) {
        throw new Error(`Managed path must be absolute: ${managedPath}`)
    }
    return join(root, managedPath)
}
