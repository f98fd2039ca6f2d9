/**
 * AWS Provider Module
 * Tree-shakable exports for AWS functionality
 */

// SDK client
export { AwsClient, createAwsClient, type AwsClientArgs } from './sdk-client';

// Provisioning steps
export { NetworkProvisioner, clusterIngressRules, firstAvailabilityZone, securityGroupName } from './network';
export { NodeLauncher, type LaunchRequest, type NodeLauncherArgs } from './launcher';

// Constants and guards
export { AWS_SPOT, AWS_TAGS, AWS_TIMEOUTS } from './constants';
export { AwsTypeGuards } from './type-guards';
