import { z } from 'zod';

export const DelaySchema = z
  .string()
  .regex(/^\d+(\.\d+)?(us|ms|s)$/, 'delay must look like 2ms, 500us or 1s');

export const TopologyNameSchema = z.enum(['dumbbell', 'parkinglot', 'multibottleneck']);

export type TopologyName = z.infer<typeof TopologyNameSchema>;

export const LinkSpecSchema = z
  .object({
    endpointA: z.string().min(1),
    endpointB: z.string().min(1),
    bandwidthMbps: z.number(),
    delay: DelaySchema,
    lossPercent: z.number(),
    maxQueuePackets: z.number().int(),
    bottleneck: z.boolean().default(false),
  })
  .readonly();

export type LinkSpec = z.infer<typeof LinkSpecSchema>;

export const CounterDirectionSchema = z.enum(['tx', 'rx']);

export type CounterDirection = z.infer<typeof CounterDirectionSchema>;

/** An interface on `node` facing `peer`, sampled in one direction. */
export const MonitorSpecSchema = z
  .object({
    node: z.string().min(1),
    peer: z.string().min(1),
    direction: CounterDirectionSchema,
  })
  .readonly();

export type MonitorSpec = z.infer<typeof MonitorSpecSchema>;

export const TopologySpecSchema = z
  .object({
    name: z.string().min(1),
    hosts: z.array(z.string().min(1)).min(2).readonly(),
    switches: z.array(z.string().min(1)).readonly(),
    links: z.array(LinkSpecSchema).min(1).readonly(),
    monitor: z.array(MonitorSpecSchema).readonly().default([]),
  })
  .readonly();

export type TopologySpec = z.infer<typeof TopologySpecSchema>;

export const TrafficPatternSchema = z.enum(['stream', 'bulk']);

export type TrafficPattern = z.infer<typeof TrafficPatternSchema>;

export const ExperimentParamsSchema = z.object({
  topology: TopologyNameSchema,
  bandwidthMbps: z.number().positive(),
  delay: DelaySchema,
  lossPercent: z.number().min(0).max(100),
  durationSeconds: z.number().int().positive(),
  hostCount: z
    .number()
    .int()
    .min(2)
    .refine((count) => count % 2 === 0, 'host count must be even'),
  accessBandwidthMbps: z.number().positive(),
  accessDelay: DelaySchema,
  maxQueuePackets: z.number().int().positive(),
});

export type ExperimentParams = z.infer<typeof ExperimentParamsSchema>;

/**
 * One progress line written by a traffic client once per second. `bytes_sent`
 * counts the bytes of that second only. `rtt_ms` is optional because clients
 * report 0 or omit it before the first acknowledgement arrives.
 */
export const FlowProgressRecordSchema = z.object({
  time: z.number().int().nonnegative(),
  bytes_sent: z.number().nonnegative().default(0),
  rtt_ms: z.number().nullable().optional(),
  cwnd_bytes: z.number().nonnegative().optional(),
});

export type FlowProgressRecord = z.infer<typeof FlowProgressRecordSchema>;

export interface FlowAssignment {
  flowId: string;
  source: string;
  destination: string;
}

export type HostRole = 'client' | 'server';

export interface MetricSample {
  readonly timestampSecondsSinceStart: number;
  readonly interfaceOrFlowId: string;
  readonly value: number;
}

export type FlowDegradedReason =
  | 'launch_failed'
  | 'early_exit'
  | 'server_exit'
  | 'log_missing'
  | 'log_unreadable'
  | 'no_progress';

export interface FlowDegraded {
  flowId: string;
  reason: FlowDegradedReason;
  detail: string;
  atSecond?: number;
}

export interface InterfaceSummaryRow {
  interface: string;
  throughputMbps: number;
  durationSeconds: number;
}

export interface ExperimentMetadata {
  topology: TopologyName;
  bandwidthMbps: number;
  delay: string;
  lossPercent: number;
  durationSeconds: number;
  hostCount: number;
  flowCount: number;
  startedAt: string;
  missedTicks: number;
  degradedFlowCount: number;
  degradedFlows: FlowDegraded[];
}

export interface ExperimentResult {
  metadata: ExperimentMetadata;
  interfaceSeries: readonly MetricSample[];
  interfaceSummary: readonly InterfaceSummaryRow[];
  rttSeries: readonly MetricSample[];
  bytesSeries: readonly MetricSample[];
  cwndSeries: readonly MetricSample[] | null;
}
