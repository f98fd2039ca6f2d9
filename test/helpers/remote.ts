/**
 * In-process remote channel answering the commands run during cluster assembly
 */

import { RemoteCommandResult, RemoteCommandRunner } from '../../src/tools/ssh'

export const TEST_JOIN_COMMAND = 'kubeadm join 10.0.1.1:6443 --token abcdef.0123456789abcdef --discovery-token-ca-cert-hash sha256:0000'

export const TEST_ADMIN_KUBECONFIG = `apiVersion: v1
clusters:
- cluster:
    certificate-authority-data: dGVzdC1jYQ==
    server: https://10.0.1.1:6443
  name: kubernetes
contexts:
- context:
    cluster: kubernetes
    user: kubernetes-admin
  name: kubernetes-admin@kubernetes
current-context: kubernetes-admin@kubernetes
kind: Config
users:
- name: kubernetes-admin
  user:
    token: test-secret
`

export interface RemoteCall {
    host: string
    command: string
}

/**
 * Returns a result to override default behavior, or undefined to fall through
 */
export type RemoteHandler = (host: string, command: string) => RemoteCommandResult | undefined

export function ok(stdout: string = ''): RemoteCommandResult {
    return { exitCode: 0, stdout, stderr: '' }
}

export function failed(exitCode: number, stderr: string = ''): RemoteCommandResult {
    return { exitCode, stdout: '', stderr }
}

export class FakeRemoteRunner implements RemoteCommandRunner {

    readonly calls: RemoteCall[] = []
    private readonly handlers: RemoteHandler[] = []

    /** Register a handler taking precedence over previously registered ones and defaults */
    on(handler: RemoteHandler): this {
        this.handlers.unshift(handler)
        return this
    }

    commandsOn(host: string): string[] {
        return this.calls.filter(c => c.host === host).map(c => c.command)
    }

    async run(host: string, command: string): Promise<RemoteCommandResult> {
        this.calls.push({ host, command })

        for (const handler of this.handlers) {
            const result = handler(host, command)
            if (result) return result
        }

        if (command === 'true') return ok()
        if (command === 'cloud-init status --wait') return ok('.....\nstatus: done\n')
        if (command === 'cloud-init status') return ok('status: done\n')
        if (command === 'sudo kubeadm token create --print-join-command') return ok(`${TEST_JOIN_COMMAND}\n`)
        if (command === 'sudo cat /etc/kubernetes/admin.conf') return ok(TEST_ADMIN_KUBECONFIG)
        if (command.startsWith('sudo kubeadm join ')) return ok('This node has joined the cluster')

        return failed(127, `unexpected command: ${command}`)
    }
}
