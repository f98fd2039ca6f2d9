/**
 * spotkube - ad-hoc Kubernetes clusters on AWS spot instances
 * Main entry point for the package
 */

export * from './core'
export * from './errors'

// AWS provider
export * from './providers/aws'

// Remote channel
export { SshClient, runChecked } from './tools/ssh'
export type { RemoteCommandOptions, RemoteCommandResult, RemoteCommandRunner, SshClientArgs } from './tools/ssh'

// Logging
export { getLogger, setLogVerbosity } from './log/utils'
export type { Logger } from './log/utils'
