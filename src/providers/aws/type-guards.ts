import { _InstanceType } from '@aws-sdk/client-ec2'

const KNOWN_INSTANCE_TYPES: ReadonlySet<string> = new Set<string>(Object.values(_InstanceType))

/**
 * AWS type guards narrowing plain strings to SDK enumerations
 */
export const AwsTypeGuards = {
    /**
     * Instance type known to the bundled EC2 SDK (e.g. 't3.large', 'g4dn.xlarge')
     */
    instanceType: (value: string): value is _InstanceType => KNOWN_INSTANCE_TYPES.has(value),
}
