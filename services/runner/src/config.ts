import { z } from 'zod';
import {
  DelaySchema,
  ExperimentParamsSchema,
  TopologyNameSchema,
  TrafficPatternSchema,
  type ExperimentParams,
  type TrafficPattern,
} from '@netexp/common';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const commandLine = z
  .string()
  .transform((value) => value.trim().split(/\s+/).filter((part) => part.length > 0))
  .refine((parts) => parts.length > 0, 'command must not be empty');

const EnvSchema = z.object({
  TOPOLOGY: TopologyNameSchema.default('dumbbell'),
  BW_MBPS: z.coerce.number().positive().default(15),
  DELAY: DelaySchema.default('2ms'),
  LOSS_PCT: z.coerce.number().min(0).max(100).default(2),
  DURATION_SEC: z.coerce.number().int().positive().default(60),
  HOSTS: z.coerce.number().int().min(2).default(40),
  ACCESS_BW_MBPS: z.coerce.number().positive().default(100),
  ACCESS_DELAY: DelaySchema.default('1ms'),
  MAX_QUEUE_PACKETS: z.coerce.number().int().positive().default(100),
  OUTPUT_ROOT: z.string().default('results'),
  OUTPUT_DIR: optionalString,
  WORK_DIR: z.string().default('/tmp/netexp'),
  SERVER_COMMAND: commandLine.default('python3 quic_server.py'),
  CLIENT_COMMAND: commandLine.default('python3 quic_client.py'),
  SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(4433),
  SERVER_READY_PATTERN: optionalString,
  SERVER_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SERVER_SETTLE_MS: z.coerce.number().int().nonnegative().default(2000),
  CLIENT_STAGGER_MS: z.coerce.number().int().nonnegative().default(20),
  TRAFFIC_PATTERN: TrafficPatternSchema.default('stream'),
  TERMINATE_GRACE_MS: z.coerce.number().int().positive().default(1500),
  SAMPLE_TICK_MS: z.coerce.number().int().positive().default(1000),
  PROCESS_LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']).default('WARNING'),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(0),
  NETNS_PREFIX: z.string().max(4).default('nx-'),
});

export interface TrafficSettings {
  serverCommand: string[];
  clientCommand: string[];
  port: number;
  pattern: TrafficPattern;
  processLogLevel: string;
  readyPattern: RegExp | null;
  readyTimeoutMs: number;
  settleMs: number;
  staggerMs: number;
  terminateGraceMs: number;
}

export interface RunnerConfig {
  experiment: ExperimentParams;
  traffic: TrafficSettings;
  outputRoot: string;
  outputDir: string | null;
  workDir: string;
  sampleTickMs: number;
  statusPort: number;
  netnsPrefix: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = EnvSchema.parse(env);

  const experiment = ExperimentParamsSchema.parse({
    topology: parsed.TOPOLOGY,
    bandwidthMbps: parsed.BW_MBPS,
    delay: parsed.DELAY,
    lossPercent: parsed.LOSS_PCT,
    durationSeconds: parsed.DURATION_SEC,
    hostCount: parsed.HOSTS,
    accessBandwidthMbps: parsed.ACCESS_BW_MBPS,
    accessDelay: parsed.ACCESS_DELAY,
    maxQueuePackets: parsed.MAX_QUEUE_PACKETS,
  });

  return {
    experiment,
    traffic: {
      serverCommand: parsed.SERVER_COMMAND,
      clientCommand: parsed.CLIENT_COMMAND,
      port: parsed.SERVER_PORT,
      pattern: parsed.TRAFFIC_PATTERN,
      processLogLevel: parsed.PROCESS_LOG_LEVEL,
      readyPattern: parsed.SERVER_READY_PATTERN ? new RegExp(parsed.SERVER_READY_PATTERN) : null,
      readyTimeoutMs: parsed.SERVER_READY_TIMEOUT_MS,
      settleMs: parsed.SERVER_SETTLE_MS,
      staggerMs: parsed.CLIENT_STAGGER_MS,
      terminateGraceMs: parsed.TERMINATE_GRACE_MS,
    },
    outputRoot: parsed.OUTPUT_ROOT,
    outputDir: parsed.OUTPUT_DIR ?? null,
    workDir: parsed.WORK_DIR,
    sampleTickMs: parsed.SAMPLE_TICK_MS,
    statusPort: parsed.STATUS_PORT,
    netnsPrefix: parsed.NETNS_PREFIX,
  };
}
