import { describe, expect, it } from 'vitest';
import { dumbbell, multibottleneck, parkinglot, topologyTemplates, type TemplateParams } from '../../src/topologies.js';
import { TopologySpecSchema } from '../../src/types.js';

const params = (hostCount: number): TemplateParams => ({
  bandwidthMbps: 15,
  delay: '2ms',
  lossPercent: 2,
  hostCount,
  accessBandwidthMbps: 100,
  accessDelay: '1ms',
  maxQueuePackets: 100,
});

describe('dumbbell', () => {
  it('puts sources on s1, destinations on s2 and the bottleneck last', () => {
    const spec = dumbbell(params(4));

    expect(spec.hosts).toEqual(['h0', 'h1', 'h2', 'h3']);
    expect(spec.switches).toEqual(['s1', 's2']);
    expect(spec.links.map((link) => [link.endpointA, link.endpointB])).toEqual([
      ['h0', 's1'],
      ['h1', 's1'],
      ['h2', 's2'],
      ['h3', 's2'],
      ['s1', 's2'],
    ]);
    expect(spec.links[4]).toEqual({
      endpointA: 's1',
      endpointB: 's2',
      bandwidthMbps: 15,
      delay: '2ms',
      lossPercent: 2,
      maxQueuePackets: 100,
      bottleneck: true,
    });
    expect(spec.monitor).toEqual([]);
  });

  it('shapes access links with the access settings and no loss', () => {
    const access = dumbbell(params(4)).links[0];

    expect(access.bandwidthMbps).toBe(100);
    expect(access.delay).toBe('1ms');
    expect(access.lossPercent).toBe(0);
    expect(access.bottleneck).toBe(false);
  });
});

describe('parkinglot', () => {
  it('splits destinations between s2 and s3', () => {
    const spec = parkinglot(params(40));
    const linkOf = (host: string) =>
      spec.links.find((link) => link.endpointA === host || link.endpointB === host);

    expect(linkOf('h19')).toMatchObject({ endpointA: 'h19', endpointB: 's1' });
    expect(linkOf('h29')).toMatchObject({ endpointA: 's2', endpointB: 'h29' });
    expect(linkOf('h30')).toMatchObject({ endpointA: 's3', endpointB: 'h30' });
  });

  it('runs the second hop at 80% of the bottleneck and monitors it', () => {
    const spec = parkinglot(params(40));
    const second = spec.links.find((link) => link.endpointA === 's2' && link.endpointB === 's3');

    expect(second?.bandwidthMbps).toBe(12);
    expect(second?.bottleneck).toBe(false);
    expect(spec.links.filter((link) => link.bottleneck)).toHaveLength(1);
    expect(spec.monitor).toEqual([{ node: 's2', peer: 's3', direction: 'tx' }]);
  });
});

describe('multibottleneck', () => {
  it('builds three stages at 100%, 80% and 60% of the bottleneck', () => {
    const spec = multibottleneck(params(8));
    const bandwidth = (a: string, b: string) =>
      spec.links.find((link) => link.endpointA === a && link.endpointB === b)?.bandwidthMbps;

    expect(bandwidth('s1', 's2')).toBe(15);
    expect(bandwidth('s1', 's3')).toBe(12);
    expect(bandwidth('s3', 's4')).toBe(12);
    expect(bandwidth('s4', 's5')).toBe(9);
    expect(bandwidth('s4', 's6')).toBe(9);
  });

  it('hangs destinations off s5 and s6', () => {
    const spec = multibottleneck(params(8));
    const switchOf = (host: string) =>
      spec.links.find((link) => link.endpointB === host)?.endpointA;

    expect(switchOf('h4')).toBe('s5');
    expect(switchOf('h5')).toBe('s5');
    expect(switchOf('h6')).toBe('s6');
    expect(switchOf('h7')).toBe('s6');
    expect(spec.monitor.map((entry) => `${entry.node}->${entry.peer}`)).toEqual([
      's2->s4',
      's3->s4',
      's4->s5',
      's4->s6',
    ]);
  });
});

describe('topologyTemplates', () => {
  it('produces specs that satisfy the schema', () => {
    for (const template of Object.values(topologyTemplates)) {
      expect(TopologySpecSchema.safeParse(template(params(6))).success).toBe(true);
    }
  });
});
