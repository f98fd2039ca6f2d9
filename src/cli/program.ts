import { Command } from '@commander-js/extra-typings'
import { confirm } from '@inquirer/prompts'
import { getLogger, setLogVerbosity } from '../log/utils'
import { CoreConfig } from '../core/config/interface'
import { ProviderClientFactory } from '../core/provider'
import { ClusterAssembler, ClusterSummary, RemoteRunnerFactory } from '../core/assembler'
import { TeardownCoordinator } from '../core/teardown'
import { ClusterLedger } from '../core/state/ledger'
import { MAIN_NODE_KEY } from '../core/state/state'
import { SPOTKUBE_ERROR_CODES } from '../core/errors/codes'
import { StateError } from '../core/errors/taxonomy'
import { ErrorUtils } from '../tools/error-utils'
import { CoreBrandedTypeCreators } from '../core/types/branded'
import { DEFAULT_CONFIG_FILE, SPOTKUBE_APP_NAME, SPOTKUBE_VERSION } from '../core/const'

/** tslog debug level */
const VERBOSE_LOG_LEVEL = 2

export interface ProgramArgs {
    coreConfig: CoreConfig
    providerFactory: ProviderClientFactory
    remoteRunnerFactory?: RemoteRunnerFactory
    /** Command output, one line per call */
    print?: (line: string) => void
    /** Ask user to confirm cluster deletion */
    confirmDelete?: (clusterName: string) => Promise<boolean>
}

async function promptDeleteConfirmation(clusterName: string): Promise<boolean> {
    return confirm({
        message: `Delete cluster ${clusterName} and every resource it owns?`,
        default: false,
    })
}

export function formatSummary(summary: ClusterSummary): string[] {
    const lines = [
        `Cluster ${summary.clusterName} ready in ${summary.region}`,
        `  main: ${summary.main.publicIp ?? '-'} (${summary.main.privateIp ?? '-'})`,
    ]
    for (const worker of summary.workers) {
        lines.push(`  ${worker.key}: ${worker.publicIp ?? '-'} (${worker.privateIp ?? '-'})`)
    }
    lines.push(`Kubeconfig: ${summary.kubeconfigPath}`)
    lines.push(`  export KUBECONFIG=${summary.kubeconfigPath}`)
    return lines
}

export function buildProgram(args: ProgramArgs) {
    const logger = getLogger('cli')
    const print = args.print ?? ((line: string) => console.log(line))
    const confirmDelete = args.confirmDelete ?? promptDeleteConfirmation
    const ledger = new ClusterLedger(args.coreConfig.dataDir)

    const program = new Command()
        .name(SPOTKUBE_APP_NAME)
        .description('Provision ad-hoc Kubernetes clusters on AWS spot instances')
        .version(SPOTKUBE_VERSION)
        .option('-v, --verbose', 'Enable debug logs')

    program.hook('preAction', (thisCommand) => {
        if (thisCommand.opts().verbose) {
            setLogVerbosity(VERBOSE_LOG_LEVEL)
        }
    })

    program.command('create')
        .description('Create a cluster, or resume an interrupted creation')
        .argument('<name>', 'Cluster name')
        .option('-c, --config <path>', 'Cluster configuration file', DEFAULT_CONFIG_FILE)
        .action(async (name, opts) => {
            const assembler = new ClusterAssembler({
                coreConfig: args.coreConfig,
                providerFactory: args.providerFactory,
                remoteRunnerFactory: args.remoteRunnerFactory,
            })
            const summary = await assembler.create({ clusterName: name, configPath: opts.config })
            formatSummary(summary).forEach(line => print(line))
        })

    program.command('delete')
        .description('Delete a cluster and all its resources')
        .argument('<name>', 'Cluster name')
        .option('-y, --yes', 'Do not ask for confirmation')
        .action(async (name, opts) => {
            CoreBrandedTypeCreators.createClusterName(name)
            if (!opts.yes && !(await confirmDelete(name))) {
                print(`Deletion of ${name} aborted`)
                return
            }
            const coordinator = new TeardownCoordinator({
                coreConfig: args.coreConfig,
                providerFactory: args.providerFactory,
            })
            await coordinator.delete(name)
            print(`Cluster ${name} deleted`)
        })

    program.command('list')
        .description('List clusters')
        .action(async () => {
            const names = await ledger.list()
            if (names.length === 0) {
                print('No clusters')
                return
            }

            for (const name of names) {
                try {
                    const record = await ledger.load(name)
                    if (!record) continue
                    const mainIp = record.nodes[MAIN_NODE_KEY]?.publicIp ?? '-'
                    print(`${name}\tcreated: ${record.createdAt}\tregion: ${record.region}\tmain: ${mainIp}\tkubeconfig: ${record.kubeconfigPath ?? '-'}`)
                } catch (error) {
                    logger.warn(`Ignoring cluster ${name}: ${ErrorUtils.extractErrorMessage(error)}`)
                    print(`${name}\t(unreadable ledger)`)
                }
            }
        })

    program.command('kubeconfig')
        .description('Print path of cluster kubeconfig')
        .argument('<name>', 'Cluster name')
        .action(async (name) => {
            const record = await ledger.load(CoreBrandedTypeCreators.createClusterName(name))
            if (!record) {
                throw new StateError(SPOTKUBE_ERROR_CODES.CLUSTER_NOT_FOUND, { clusterName: name })
            }
            if (!record.kubeconfigPath) {
                throw new StateError(SPOTKUBE_ERROR_CODES.KUBECONFIG_NOT_FOUND, { clusterName: name })
            }
            print(record.kubeconfigPath)
        })

    return program
}
