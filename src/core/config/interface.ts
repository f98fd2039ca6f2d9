import { z } from "zod"

export const TimingsSchema = z.object({
    spotPollIntervalMs: z.number().int().nonnegative().describe("Interval between two spot request status checks"),
    spotFulfilmentTimeoutMs: z.number().int().positive().describe("Time allowed for a spot request to be fulfilled"),
    instanceRunningMaxWaitSeconds: z.number().int().positive().describe("Max wait for an instance to reach running state"),
    instanceTerminatedMaxWaitSeconds: z.number().int().positive().describe("Max wait for instances to reach terminated state"),
    publicIpPollIntervalMs: z.number().int().nonnegative().describe("Interval between two public address checks"),
    publicIpMaxAttempts: z.number().int().positive().describe("Number of public address checks before giving up"),
    sshPollIntervalMs: z.number().int().nonnegative().describe("Interval between two SSH connection attempts"),
    sshReachableTimeoutSeconds: z.number().positive().describe("Time allowed for a node to accept SSH sessions"),
})

export const CoreConfigSchema = z.object({
    dataDir: z.string().min(1).describe("Root directory holding one state directory per cluster"),
    timings: TimingsSchema,
})

export type Timings = z.infer<typeof TimingsSchema>
export type CoreConfig = z.infer<typeof CoreConfigSchema>
