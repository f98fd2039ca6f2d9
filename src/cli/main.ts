#!/usr/bin/env node

import { buildProgram } from './program'
import { ConfigLoader } from '../core/config/default'
import { createAwsClient } from '../providers/aws/sdk-client'
import { extractErrorDetails } from '../core/errors/taxonomy'
import { getLogger } from '../log/utils'

const logger = getLogger('main')

async function main(): Promise<void> {
    const program = buildProgram({
        coreConfig: ConfigLoader.load(),
        providerFactory: createAwsClient,
    })
    await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
    const details = extractErrorDetails(error)
    logger.error(details.code ? `[${details.code}] ${details.message}` : details.message)
    for (const suggestion of details.suggestions ?? []) {
        logger.info(`Suggestion: ${suggestion}`)
    }
    logger.debug('Error details', error)
    process.exitCode = 1
})
