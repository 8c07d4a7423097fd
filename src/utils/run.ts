/***
 *
 *
 *  Running Utilities
 *
 */

import { spawn } from "node:child_process"
import { Spinner, Logger } from "./log"
import { Settings } from "../settings"

export interface RunnerOptions {
    message?: string
    messageOnSuccess?: string
    messageOnError?: string
    cwd?: string
    env?: NodeJS.ProcessEnv
}

export interface RunResult {
    exitCode: number
    stdout: string
    stderr: string
}

/**
 * Anything able to run an external command. The systemctl service manager
 * takes one so it can be driven by a fake in tests.
 */
export interface CommandRunner {
    exec(command: string, args: string[], options?: RunnerOptions): Promise<RunResult>
    runCommand(command: string, args: string[], options: RunnerOptions): Promise<RunResult>
}

export class CommandFailedError extends Error {
    constructor(
        readonly command: string,
        readonly result: RunResult
    ) {
        super(`${command} exited with code ${result.exitCode}${result.stderr.trim() ? `: ${result.stderr.trim()}` : ""}`)
        this.name = "CommandFailedError"
    }
}

export class RunnerClass implements CommandRunner {

    /**
     * Runs a command and resolves with its exit code and output, whatever the exit code
     */
    public exec(command: string, args: string[], options: RunnerOptions = {}): Promise<RunResult> {
        return new Promise((resolve, reject) => {
            let stdout = ""
            let stderr = ""

            const proc = spawn(command, args, {
                stdio: ["ignore", "pipe", "pipe"],
                cwd: options.cwd ?? process.cwd(),
                env: options.env ?? process.env
            })

            proc.stdout.setEncoding("utf-8")
            proc.stderr.setEncoding("utf-8")

            proc.stdout.on("data", (text: string) => {
                stdout += text
                // In verbose mode, output everything immediately
                if (Settings.verbose) {
                    process.stdout.write(text)
                }
            })

            proc.stderr.on("data", (text: string) => {
                stderr += text
                if (Settings.verbose) {
                    process.stderr.write(text)
                }
            })

            proc.on("error", reject)
            proc.on("close", (code) => {
                resolve({ exitCode: code ?? 1, stdout, stderr })
            })
        })
    }

    /**
     * Runs a command behind a spinner and throws when it exits non-zero
     */
    public async runCommand(command: string, args: string[], options: RunnerOptions): Promise<RunResult> {
        const display = [command, ...args].join(" ")
        const message = options.message ?? display
        const spinner = new Spinner(message)

        // If verbose mode is enabled, don't use spinner (it interferes with output)
        if (!Settings.verbose) {
            spinner.start()
        } else {
            Logger.log(message)
        }

        let result: RunResult
        try {
            result = await this.exec(command, args, options)
        } catch (err) {
            spinner.stop()
            throw err
        }

        if (result.exitCode === 0) {
            const successMessage = options.messageOnSuccess ?? message
            if (Settings.verbose) {
                Logger.success(successMessage)
            } else {
                spinner.stopWithSuccess(successMessage)
            }
            return result
        }

        const errorMessage = options.messageOnError ?? `${display} failed with exit code ${result.exitCode}`
        spinner.stopWithError(errorMessage)
        if (!Settings.verbose && result.stderr.trim()) {
            Logger.raw(result.stderr)
        }
        throw new CommandFailedError(display, result)
    }

}

export const Runner = new RunnerClass()
