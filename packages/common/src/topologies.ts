import type { LinkSpec, MonitorSpec, TopologyName, TopologySpec } from './types.js';

export interface TemplateParams {
  bandwidthMbps: number;
  delay: string;
  lossPercent: number;
  hostCount: number;
  accessBandwidthMbps: number;
  accessDelay: string;
  maxQueuePackets: number;
}

export type TopologyTemplate = (params: TemplateParams) => TopologySpec;

// Intermediate stages of the multi-hop templates run slower than the first bottleneck.
export const SECOND_STAGE_FACTOR = 0.8;
export const THIRD_STAGE_FACTOR = 0.6;

function hostIds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `h${i}`);
}

function accessLink(a: string, b: string, params: TemplateParams): LinkSpec {
  return {
    endpointA: a,
    endpointB: b,
    bandwidthMbps: params.accessBandwidthMbps,
    delay: params.accessDelay,
    lossPercent: 0,
    maxQueuePackets: params.maxQueuePackets,
    bottleneck: false,
  };
}

function shapedLink(
  a: string,
  b: string,
  bandwidthMbps: number,
  params: TemplateParams,
  bottleneck = false
): LinkSpec {
  return {
    endpointA: a,
    endpointB: b,
    bandwidthMbps,
    delay: params.delay,
    lossPercent: params.lossPercent,
    maxQueuePackets: params.maxQueuePackets,
    bottleneck,
  };
}

function tx(node: string, peer: string): MonitorSpec {
  return { node, peer, direction: 'tx' };
}

/**
 * Two switches joined by the bottleneck; sources hang off s1 and
 * destinations off s2.
 */
export const dumbbell: TopologyTemplate = (params) => {
  const hosts = hostIds(params.hostCount);
  const mid = Math.floor(params.hostCount / 2);
  const links: LinkSpec[] = [];

  hosts.forEach((host, i) => {
    links.push(accessLink(host, i < mid ? 's1' : 's2', params));
  });
  links.push(shapedLink('s1', 's2', params.bandwidthMbps, params, true));

  return {
    name: 'dumbbell',
    hosts,
    switches: ['s1', 's2'],
    links,
    monitor: [],
  };
};

/**
 * Three switches in a line. Destinations are split between s2 and s3, so the
 * second hop carries only part of the traffic at a lower rate.
 */
export const parkinglot: TopologyTemplate = (params) => {
  const hosts = hostIds(params.hostCount);
  const mid = Math.floor(params.hostCount / 2);
  const split = mid + Math.floor(mid / 2);
  const links: LinkSpec[] = [];

  hosts.forEach((host, i) => {
    if (i < mid) {
      links.push(accessLink(host, 's1', params));
    } else {
      links.push(accessLink(i < split ? 's2' : 's3', host, params));
    }
  });
  links.push(shapedLink('s1', 's2', params.bandwidthMbps, params, true));
  links.push(shapedLink('s2', 's3', params.bandwidthMbps * SECOND_STAGE_FACTOR, params));

  return {
    name: 'parkinglot',
    hosts,
    switches: ['s1', 's2', 's3'],
    links,
    monitor: [tx('s2', 's3')],
  };
};

/**
 * s1 fans out to s2/s3, which converge on s4, which fans out again to the
 * destination switches s5/s6.
 */
export const multibottleneck: TopologyTemplate = (params) => {
  const hosts = hostIds(params.hostCount);
  const mid = Math.floor(params.hostCount / 2);
  const split = mid + Math.floor(mid / 2);
  const second = params.bandwidthMbps * SECOND_STAGE_FACTOR;
  const third = params.bandwidthMbps * THIRD_STAGE_FACTOR;
  const links: LinkSpec[] = [];

  hosts.forEach((host, i) => {
    if (i < mid) {
      links.push(accessLink(host, 's1', params));
    } else {
      links.push(accessLink(i < split ? 's5' : 's6', host, params));
    }
  });

  links.push(shapedLink('s1', 's2', params.bandwidthMbps, params, true));
  links.push(shapedLink('s1', 's3', second, params));
  links.push(shapedLink('s2', 's4', second, params));
  links.push(shapedLink('s3', 's4', second, params));
  links.push(shapedLink('s4', 's5', third, params));
  links.push(shapedLink('s4', 's6', third, params));

  return {
    name: 'multibottleneck',
    hosts,
    switches: ['s1', 's2', 's3', 's4', 's5', 's6'],
    links,
    monitor: [tx('s2', 's4'), tx('s3', 's4'), tx('s4', 's5'), tx('s4', 's6')],
  };
};

export const topologyTemplates: Record<TopologyName, TopologyTemplate> = {
  dumbbell,
  parkinglot,
  multibottleneck,
};
