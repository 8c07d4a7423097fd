/***
 *
 *  Service Manager
 *
 *  The enable/run state side of applying a catalog.
 *
 */

import { Runner, type CommandRunner } from "../../utils/run"

export interface ServiceManager {
    daemonReload(): Promise<void>
    isActive(unit: string): Promise<boolean>
    isEnabled(unit: string): Promise<boolean>
    start(unit: string): Promise<void>
    stop(unit: string): Promise<void>
    enable(unit: string): Promise<void>
    disable(unit: string): Promise<void>
}

export class SystemctlServiceManager implements ServiceManager {

    constructor(private readonly runner: CommandRunner = Runner) {}

    public async daemonReload(): Promise<void> {
        await this.runner.runCommand("systemctl", ["daemon-reload"], {
            message: "Reloading systemd manager configuration...",
            messageOnSuccess: "Reloaded systemd manager configuration",
        })
    }

    // is-active/is-enabled answer through their exit code
    public async isActive(unit: string): Promise<boolean> {
        const result = await this.runner.exec("systemctl", ["is-active", "--quiet", unit])
        return result.exitCode === 0
    }

    public async isEnabled(unit: string): Promise<boolean> {
        const result = await this.runner.exec("systemctl", ["is-enabled", "--quiet", unit])
        return result.exitCode === 0
    }

    public async start(unit: string): Promise<void> {
        await this.runner.runCommand("systemctl", ["start", unit], {
            message: `Starting ${unit}...`,
            messageOnSuccess: `Started ${unit}`,
        })
    }

    public async stop(unit: string): Promise<void> {
        await this.runner.runCommand("systemctl", ["stop", unit], {
            message: `Stopping ${unit}...`,
            messageOnSuccess: `Stopped ${unit}`,
        })
    }

    public async enable(unit: string): Promise<void> {
        await this.runner.runCommand("systemctl", ["enable", unit], {
            message: `Enabling ${unit}...`,
            messageOnSuccess: `Enabled ${unit}`,
        })
    }

    public async disable(unit: string): Promise<void> {
        await this.runner.runCommand("systemctl", ["disable", unit], {
            message: `Disabling ${unit}...`,
            messageOnSuccess: `Disabled ${unit}`,
        })
    }

}
