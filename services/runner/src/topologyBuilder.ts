import { z } from 'zod';
import {
  TopologyError,
  describeError,
  parseDelayMs,
  type CounterDirection,
  type LinkSpec,
  type TopologySpec,
} from '@netexp/common';
import type { EmulationBackend } from './backend.js';
import { createLogger } from './logger.js';

const logger = createLogger('topology');

const ShapingLimitsSchema = z.object({
  bandwidthMbps: z.number().gt(0).lte(1000),
  delayMs: z.number().min(0).max(10_000),
  lossPercent: z.number().min(0).max(100),
  maxQueuePackets: z.number().int().min(1),
});

export interface LiveLink {
  spec: LinkSpec;
  interfaceA: string;
  interfaceB: string;
}

export interface MonitoredInterface {
  interfaceId: string;
  node: string;
  peer: string;
  direction: CounterDirection;
  bottleneck: boolean;
}

export function hostAddress(index: number): string {
  const n = index + 1;
  return `10.0.${Math.floor(n / 256)}.${n % 256}`;
}

/**
 * A topology that exists on the backend. Owns every host, switch and link
 * until `teardown`, which may be called any number of times.
 */
export class LiveTopology {
  private readonly links: LiveLink[] = [];
  private teardownPromise: Promise<void> | null = null;

  constructor(
    readonly spec: TopologySpec,
    private readonly backend: EmulationBackend,
    private readonly addresses: ReadonlyMap<string, string>
  ) {}

  get name(): string {
    return this.spec.name;
  }

  get liveLinks(): readonly LiveLink[] {
    return this.links;
  }

  get isTornDown(): boolean {
    return this.teardownPromise !== null;
  }

  get bottleneck(): LiveLink {
    const link = this.links.find((candidate) => candidate.spec.bottleneck);
    if (!link) {
      throw new TopologyError(`Topology ${this.name} has no bottleneck link`);
    }
    return link;
  }

  addressOf(hostId: string): string {
    const address = this.addresses.get(hostId);
    if (!address) {
      throw new TopologyError(`Host ${hostId} is not part of topology ${this.name}`);
    }
    return address;
  }

  /** Name of the interface on `node` that faces `peer`. */
  interfaceFor(node: string, peer: string): string {
    for (const link of this.links) {
      if (link.spec.endpointA === node && link.spec.endpointB === peer) {
        return link.interfaceA;
      }
      if (link.spec.endpointB === node && link.spec.endpointA === peer) {
        return link.interfaceB;
      }
    }
    throw new TopologyError(`No link between ${node} and ${peer} in topology ${this.name}`);
  }

  /**
   * The bottleneck counters (tx where traffic enters the link, rx where it
   * leaves) followed by the template's extra interfaces.
   */
  monitoredInterfaces(): MonitoredInterface[] {
    const { spec, interfaceA, interfaceB } = this.bottleneck;
    const monitored: MonitoredInterface[] = [
      { interfaceId: interfaceA, node: spec.endpointA, peer: spec.endpointB, direction: 'tx', bottleneck: true },
      { interfaceId: interfaceB, node: spec.endpointB, peer: spec.endpointA, direction: 'rx', bottleneck: true },
    ];

    for (const extra of this.spec.monitor) {
      const interfaceId = this.interfaceFor(extra.node, extra.peer);
      if (monitored.some((entry) => entry.interfaceId === interfaceId && entry.direction === extra.direction)) {
        continue;
      }
      monitored.push({
        interfaceId,
        node: extra.node,
        peer: extra.peer,
        direction: extra.direction,
        bottleneck: false,
      });
    }
    return monitored;
  }

  recordLink(link: LiveLink): void {
    this.links.push(link);
  }

  teardown(): Promise<void> {
    if (!this.teardownPromise) {
      logger.info(`Tearing down topology ${this.name}`);
      this.teardownPromise = this.backend.destroyAll().catch((error: unknown) => {
        throw new TopologyError(`Teardown of topology ${this.name} failed: ${describeError(error)}`, {
          cause: error,
        });
      });
    }
    return this.teardownPromise;
  }
}

export class TopologyBuilder {
  constructor(private readonly backend: EmulationBackend) {}

  /** Rejects specs the backend must never see. */
  validate(spec: TopologySpec): void {
    const problems: string[] = [];
    const declared = new Set<string>();

    for (const id of [...spec.hosts, ...spec.switches]) {
      if (declared.has(id)) {
        problems.push(`node ${id} is declared twice`);
      }
      declared.add(id);
    }

    spec.links.forEach((link, index) => {
      for (const endpoint of [link.endpointA, link.endpointB]) {
        if (!declared.has(endpoint)) {
          problems.push(`link ${index} references undeclared endpoint ${endpoint}`);
        }
      }
      if (link.endpointA === link.endpointB) {
        problems.push(`link ${index} connects ${link.endpointA} to itself`);
      }

      let delayMs: number;
      try {
        delayMs = parseDelayMs(link.delay);
      } catch (error) {
        problems.push(`link ${index}: ${describeError(error)}`);
        return;
      }

      const limits = ShapingLimitsSchema.safeParse({
        bandwidthMbps: link.bandwidthMbps,
        delayMs,
        lossPercent: link.lossPercent,
        maxQueuePackets: link.maxQueuePackets,
      });
      if (!limits.success) {
        for (const issue of limits.error.issues) {
          problems.push(`link ${index} ${issue.path.join('.')}: ${issue.message}`);
        }
      }
    });

    const bottlenecks = spec.links.filter((link) => link.bottleneck).length;
    if (bottlenecks !== 1) {
      problems.push(`expected exactly one bottleneck link, found ${bottlenecks}`);
    }

    for (const extra of spec.monitor) {
      const connected = spec.links.some(
        (link) =>
          (link.endpointA === extra.node && link.endpointB === extra.peer) ||
          (link.endpointB === extra.node && link.endpointA === extra.peer)
      );
      if (!connected) {
        problems.push(`monitored interface ${extra.node}->${extra.peer} has no link`);
      }
    }

    if (problems.length > 0) {
      throw new TopologyError(`Invalid topology ${spec.name}: ${problems.join('; ')}`);
    }
  }

  /**
   * Creates every host, switch and link of `spec`. On any failure the partial
   * topology is destroyed before the TopologyError propagates.
   */
  async build(spec: TopologySpec): Promise<LiveTopology> {
    this.validate(spec);

    const addresses = new Map(spec.hosts.map((host, index) => [host, hostAddress(index)] as const));
    const live = new LiveTopology(spec, this.backend, addresses);

    try {
      for (const host of spec.hosts) {
        await this.backend.createHost(host, live.addressOf(host));
      }
      for (const switchId of spec.switches) {
        await this.backend.createSwitch(switchId);
      }
      for (const link of spec.links) {
        const created = await this.backend.createLink(link.endpointA, link.endpointB, {
          bandwidthMbps: link.bandwidthMbps,
          delay: link.delay,
          lossPercent: link.lossPercent,
          maxQueuePackets: link.maxQueuePackets,
        });
        live.recordLink({ spec: link, ...created });
      }
    } catch (error) {
      logger.error({ err: error }, `Building topology ${spec.name} failed, releasing partial state`);
      await live.teardown().catch((teardownError: unknown) => {
        logger.error({ err: teardownError }, 'Releasing partial topology failed');
      });
      throw new TopologyError(`Could not build topology ${spec.name}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const bottleneck = live.bottleneck;
    logger.info(
      `Topology ${spec.name} up: ${spec.hosts.length} hosts, ${spec.switches.length} switches, ` +
        `${spec.links.length} links, bottleneck ${bottleneck.spec.endpointA}-${bottleneck.spec.endpointB} ` +
        `(${bottleneck.interfaceA})`
    );
    return live;
  }

  teardown(live: LiveTopology): Promise<void> {
    return live.teardown();
  }
}
