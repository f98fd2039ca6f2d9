import * as fs from 'fs'
import * as path from 'path'
import { getLogger } from '../../log/utils'
import { SPOTKUBE_ERROR_CODES } from '../errors/codes'
import { StateError } from '../errors/taxonomy'
import { ErrorUtils } from '../../tools/error-utils'
import { KUBECONFIG_FILE_NAME, LEDGER_FILE_NAME } from '../const'
import { ClusterRecord, ClusterRecordSchema } from './state'

/**
 * Durable per-cluster ledger. Each cluster owns one directory under the data root:
 *
 * <dataDir>/<clusterName>/cluster-resources.json
 * <dataDir>/<clusterName>/kubeconfig
 */
export class ClusterLedger {

    private readonly logger = getLogger(ClusterLedger.name)

    constructor(readonly dataDir: string) {}

    clusterDir(clusterName: string): string {
        return path.join(this.dataDir, clusterName)
    }

    ledgerFile(clusterName: string): string {
        return path.join(this.clusterDir(clusterName), LEDGER_FILE_NAME)
    }

    kubeconfigFile(clusterName: string): string {
        return path.join(this.clusterDir(clusterName), KUBECONFIG_FILE_NAME)
    }

    async exists(clusterName: string): Promise<boolean> {
        try {
            await fs.promises.access(this.ledgerFile(clusterName))
            return true
        } catch {
            return false
        }
    }

    /**
     * Load cluster record. Returns undefined if cluster has no ledger.
     * @throws StateError if ledger exists but cannot be read or parsed
     */
    async load(clusterName: string): Promise<ClusterRecord | undefined> {
        const filePath = this.ledgerFile(clusterName)
        this.logger.debug(`Loading ledger ${filePath}`)

        let content: string
        try {
            content = await fs.promises.readFile(filePath, 'utf-8')
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return undefined
            }
            throw new StateError(
                SPOTKUBE_ERROR_CODES.STATE_UNREADABLE,
                { path: filePath, reason: ErrorUtils.extractErrorMessage(error) },
                ErrorUtils.toError(error)
            )
        }

        let raw: unknown
        try {
            raw = JSON.parse(content)
        } catch (error) {
            throw new StateError(
                SPOTKUBE_ERROR_CODES.STATE_UNREADABLE,
                { path: filePath, reason: ErrorUtils.extractErrorMessage(error) },
                ErrorUtils.toError(error)
            )
        }

        const result = ClusterRecordSchema.safeParse(raw)
        if (!result.success) {
            throw new StateError(
                SPOTKUBE_ERROR_CODES.STATE_UNREADABLE,
                { path: filePath, reason: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') },
                result.error
            )
        }

        return result.data
    }

    /**
     * Persist record, fully replacing any previous content.
     * Content is written to a temporary file then renamed over the ledger.
     */
    async save(record: ClusterRecord): Promise<void> {
        const filePath = this.ledgerFile(record.clusterName)
        const tmpPath = `${filePath}.${process.pid}.tmp`

        this.logger.trace(`Saving ledger ${filePath}: ${JSON.stringify(record)}`)

        try {
            await fs.promises.mkdir(this.clusterDir(record.clusterName), { recursive: true })

            const handle = await fs.promises.open(tmpPath, 'w')
            try {
                await handle.writeFile(JSON.stringify(record, null, 2), 'utf-8')
                await handle.sync()
            } finally {
                await handle.close()
            }

            await fs.promises.rename(tmpPath, filePath)
        } catch (error) {
            throw new StateError(
                SPOTKUBE_ERROR_CODES.STATE_WRITE_FAILED,
                { path: filePath, reason: ErrorUtils.extractErrorMessage(error) },
                ErrorUtils.toError(error)
            )
        }
    }

    /**
     * Remove the whole cluster directory (ledger and kubeconfig)
     */
    async delete(clusterName: string): Promise<void> {
        const dir = this.clusterDir(clusterName)
        this.logger.debug(`Removing cluster directory ${dir}`)
        await fs.promises.rm(dir, { recursive: true, force: true })
    }

    /**
     * Names of clusters having a ledger, sorted
     */
    async list(): Promise<string[]> {
        let entries: fs.Dirent[]
        try {
            entries = await fs.promises.readdir(this.dataDir, { withFileTypes: true })
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return []
            }
            throw error
        }

        const names: string[] = []
        for (const entry of entries) {
            if (entry.isDirectory() && await this.exists(entry.name)) {
                names.push(entry.name)
            }
        }
        return names.sort()
    }
}
