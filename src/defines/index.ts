export * from "./manage-unit"
export * from "./timer-wrapper"
export * from "./tmpfile"
