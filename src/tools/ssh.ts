import execa from 'execa'
import { getLogger } from '../log/utils'
import { SPOTKUBE_ERROR_CODES } from '../core/errors/codes'
import { RemoteCommandError } from '../core/errors/taxonomy'
import { READINESS_TIMEOUTS } from '../core/const'

export interface RemoteCommandResult {
    exitCode: number
    stdout: string
    stderr: string
}

export interface RemoteCommandOptions {
    /** Kill the session after this long (milliseconds) */
    timeoutMs?: number
}

/**
 * Runs one command per session on a remote host.
 * Implementations never throw on a non-zero exit, callers inspect exitCode.
 */
export interface RemoteCommandRunner {
    run(host: string, command: string, opts?: RemoteCommandOptions): Promise<RemoteCommandResult>
}

export interface SshClientArgs {
    user: string
    privateKeyPath: string
    connectTimeoutSeconds?: number
}

/**
 * Exit code reported by the ssh binary itself when a session cannot be established
 */
export const SSH_CONNECTION_FAILED_EXIT_CODE = 255

const DEFAULT_CONNECT_TIMEOUT_SECONDS = 10

/**
 * Remote channel over the system ssh binary, authenticated by private key
 */
export class SshClient implements RemoteCommandRunner {

    private readonly logger = getLogger(SshClient.name)

    constructor(private readonly args: SshClientArgs) {}

    private sshArgs(host: string): string[] {
        return [
            "-i", this.args.privateKeyPath,
            "-o", "StrictHostKeyChecking=no",
            "-o", "UserKnownHostsFile=/dev/null",
            "-o", "LogLevel=ERROR",
            "-o", "BatchMode=yes",
            "-o", `ConnectTimeout=${this.args.connectTimeoutSeconds ?? DEFAULT_CONNECT_TIMEOUT_SECONDS}`,
            `${this.args.user}@${host}`,
        ]
    }

    async run(host: string, command: string, opts?: RemoteCommandOptions): Promise<RemoteCommandResult> {
        this.logger.debug(`Running on ${host}: ${command}`)

        const result = await execa("ssh", [...this.sshArgs(host), command], {
            reject: false,
            timeout: opts?.timeoutMs ?? READINESS_TIMEOUTS.REMOTE_COMMAND_TIMEOUT_MS,
            stdin: 'ignore',
        })

        // spawn failures and timeouts carry no exit code
        const exitCode = typeof result.exitCode === 'number' ? result.exitCode : SSH_CONNECTION_FAILED_EXIT_CODE

        this.logger.debug(`Command on ${host} exited with ${exitCode}${result.timedOut ? ' (timed out)' : ''}`)

        return {
            exitCode: exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
        }
    }
}

/**
 * Run a command whose success the workflow depends on.
 * @throws RemoteCommandError on non-zero exit
 */
export async function runChecked(
    runner: RemoteCommandRunner,
    host: string,
    command: string,
    opts?: RemoteCommandOptions
): Promise<RemoteCommandResult> {
    const result = await runner.run(host, command, opts)
    if (result.exitCode !== 0) {
        throw new RemoteCommandError(SPOTKUBE_ERROR_CODES.REMOTE_COMMAND_FAILED, {
            command: command,
            host: host,
            exitCode: result.exitCode,
            stderr: result.stderr.trim(),
        })
    }
    return result
}
