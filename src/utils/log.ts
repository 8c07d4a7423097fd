/***
 *
 *
 *  Logging Utilities
 *
 */

import { Settings } from "../settings"
import chalk from "chalk"
import ora, { type Ora } from "ora"

// Unicode box-drawing characters for consistent styling
const ICONS = {
    arrow: "›",
    success: "✓",
    error: "✗",
    warning: "⚠",
    unchanged: "◆",
    debug: "○",
} as const

export class Logger {
    // Styled prefix badge
    static prefix = chalk.bold.cyan("sysunit")

    // Format a message with the standard prefix
    private static format(icon: string, iconColor: (s: string) => string, message: string): string {
        return `${Logger.prefix} ${iconColor(icon)} ${message}`
    }

    public static log(message: string) {
        console.log(Logger.format(ICONS.arrow, chalk.cyan, message))
    }

    public static success(message: string) {
        console.log(Logger.format(ICONS.success, chalk.green, chalk.green(message)))
    }

    public static debug(message: string) {
        if (Settings.verbose) {
            console.log(Logger.format(ICONS.debug, chalk.yellow, chalk.dim(message)))
        }
    }

    public static error(message: string) {
        console.error(Logger.format(ICONS.error, chalk.red, chalk.red(message)))
    }

    public static unchanged(message: string) {
        console.log(Logger.format(ICONS.unchanged, chalk.magenta, `${message} ${chalk.dim("(unchanged)")}`))
    }

    public static warning(message: string) {
        console.log(Logger.format(ICONS.warning, chalk.yellow, chalk.yellow(message)))
    }

    public static title(msg: string): void {
        console.log()
        console.log(chalk.bold.cyan(`${msg}`))
        console.log(chalk.dim("─".repeat(Math.min(msg.length + 4, 60))))
    }

    // For printing raw output (like rendered unit files) with proper indentation
    public static raw(message: string): void {
        const indent = "       " // Align with message text after prefix and icon
        const lines = message.split("\n")
        for (const line of lines) {
            if (line.trim()) {
                console.log(`${indent}${chalk.dim(line)}`)
            }
        }
    }
}

export class Spinner {
    private spinner: Ora | null = null
    private readonly message: string

    constructor(message: string) {
        this.message = message
    }

    start(): void {
        this.spinner = ora({
            text: this.message,
            spinner: {
                interval: 80,
                frames: ["◐", "◓", "◑", "◒"].map(f => `${Logger.prefix} ${chalk.cyan(f)}`)
            },
            prefixText: "",
        }).start()
    }

    stop(): void {
        if (this.spinner) {
            this.spinner.stop()
            this.spinner = null
        }
    }

    stopWithSuccess(msg: string): void {
        this.stop()
        Logger.success(msg)
    }

    stopWithError(msg: string): void {
        this.stop()
        Logger.error(msg)
    }
}
