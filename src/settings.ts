/***
 *
 *
 *  Settings Store
 *
 */

import { SYSUNIT_VERSION } from "./version"

export const DEFAULT_UNIT_DIR = "/etc/systemd/system"
export const DEFAULT_TMPFILES_DIR = "/etc/tmpfiles.d"


export class SettingsConfig {

    verbose: boolean

    // Filesystem prefix every managed path is written under
    root: string

    unitDir: string
    tmpfilesDir: string

    sysunitVersion: string


    constructor() {

        // Default Verbosity
        this.verbose = false

        // Default Root (the live system unless overridden from the environment)
        const envRoot = process.env.SYSUNIT_ROOT?.trim()
        this.root = envRoot && envRoot.length > 0 ? envRoot : "/"

        this.unitDir = DEFAULT_UNIT_DIR
        this.tmpfilesDir = DEFAULT_TMPFILES_DIR

        this.sysunitVersion = SYSUNIT_VERSION
    }

}


export const Settings = new SettingsConfig()
