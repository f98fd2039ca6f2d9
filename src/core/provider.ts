/**
 * Cloud provider operations the provisioning workflow depends on.
 *
 * Calls are synchronous requests against an eventually consistent API:
 * reads following a write may lag and callers poll until they converge.
 */

/**
 * Ingress rule of a security group
 */
export type IngressRule =
    | { kind: 'same-group' }
    | { kind: 'cidr', protocol: 'tcp', port: number, cidr: string }

export interface SpotLaunchSpec {
    imageId: string
    instanceType: string
    keyName: string
    subnetId: string
    securityGroupId: string
    /** Base64 encoded boot script */
    userDataBase64: string
    maxPrice: string
}

export interface SpotRequestStatus {
    /** Status code, e.g. 'pending-fulfillment', 'fulfilled', 'price-too-low' */
    code: string
    /** Set once request is fulfilled */
    instanceId?: string
}

export interface InstanceAddresses {
    publicIp?: string
    privateIp?: string
}

export interface ClusterProviderApi {
    readonly region: string

    /** Read a parameter store value (e.g. boot image ID) */
    getParameter(name: string): Promise<string>

    getDefaultVpcId(): Promise<string>
    createSubnet(vpcId: string, cidrBlock: string, availabilityZone: string): Promise<string>
    enableSubnetPublicIp(subnetId: string): Promise<void>
    createSecurityGroup(name: string, description: string, vpcId: string): Promise<string>
    authorizeIngress(securityGroupId: string, rules: IngressRule[]): Promise<void>
    deleteSecurityGroup(securityGroupId: string): Promise<void>
    deleteSubnet(subnetId: string): Promise<void>

    /** Submit a one-time spot request for a single instance, returns request ID */
    requestSpotInstance(launchSpec: SpotLaunchSpec): Promise<string>
    describeSpotRequest(spotRequestId: string): Promise<SpotRequestStatus>
    cancelSpotRequests(spotRequestIds: string[]): Promise<void>

    /** Block until instance is running */
    waitForInstanceRunning(instanceId: string, maxWaitSeconds: number): Promise<void>
    tagInstance(instanceId: string, tags: Record<string, string>): Promise<void>
    describeInstanceAddresses(instanceId: string): Promise<InstanceAddresses>
    terminateInstances(instanceIds: string[]): Promise<void>

    /** Block until all instances are terminated */
    waitForInstancesTerminated(instanceIds: string[], maxWaitSeconds: number): Promise<void>
}

/**
 * Opens provider clients for a region
 */
export type ProviderClientFactory = (region: string) => ClusterProviderApi
