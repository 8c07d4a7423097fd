/***
 *
 *  Library Entry Point
 *
 */

export * from "./catalog"
export * from "./defines"
export * from "./errors"
export * from "./types/unit"
export { ManifestSchema, ManifestValidator, type Manifest } from "./types/manifest-yaml"
export { renderUnitFile, UNIT_FILE_HEADER } from "./files/systemd/unit-file"
export { systemdEscape, systemdEscapePath, systemdUnescape, systemdUnescapePath, withSuffix, type UnitType } from "./utils/escape"
export { compileManifest, compileManifestFile, formatPlan, type CompileOptions } from "./tools/compile"
export { applyCatalog, SystemctlServiceManager, DAEMON_RELOAD_REF, type ApplyOptions, type ApplyReport, type Change, type ChangeAction, type ServiceManager } from "./tools/apply"
export { Settings } from "./settings"
