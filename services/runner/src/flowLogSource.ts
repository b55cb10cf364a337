import { readFile } from 'fs/promises';
import {
  FlowProgressRecordSchema,
  describeError,
  type FlowAssignment,
  type FlowDegraded,
  type FlowProgressRecord,
} from '@netexp/common';

export interface ParsedProgressLog {
  records: FlowProgressRecord[];
  /** Lines that were blank, truncated or did not match the record shape. */
  discarded: number;
}

export interface FlowLog extends ParsedProgressLog {
  flow: FlowAssignment;
}

export type FlowLogResult = { ok: true; log: FlowLog } | { ok: false; degraded: FlowDegraded };

/** Where per-flow progress records come from once traffic has ended. */
export interface FlowLogSource {
  read(flow: FlowAssignment): Promise<FlowLogResult>;
}

export function parseProgressLog(content: string): ParsedProgressLog {
  const records: FlowProgressRecord[] = [];
  let discarded = 0;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      discarded++;
      continue;
    }

    const parsed = FlowProgressRecordSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      discarded++;
    }
  }

  return { records, discarded };
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Reads the JSON-lines metrics file each client writes. */
export class FileFlowLogSource implements FlowLogSource {
  constructor(private readonly pathFor: (flow: FlowAssignment) => string) {}

  async read(flow: FlowAssignment): Promise<FlowLogResult> {
    const path = this.pathFor(flow);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      const reason = hasCode(error, 'ENOENT') ? 'log_missing' : 'log_unreadable';
      return {
        ok: false,
        degraded: { flowId: flow.flowId, reason, detail: `${path}: ${describeError(error)}` },
      };
    }

    const parsed = parseProgressLog(content);
    if (parsed.records.length === 0) {
      return {
        ok: false,
        degraded: {
          flowId: flow.flowId,
          reason: 'no_progress',
          detail: `${path} has no valid progress records (${parsed.discarded} discarded lines)`,
        },
      };
    }

    return { ok: true, log: { flow, ...parsed } };
  }
}
