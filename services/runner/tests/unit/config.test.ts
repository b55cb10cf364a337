import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('falls back to the default experiment', () => {
    const config = loadConfig({});

    expect(config.experiment).toEqual({
      topology: 'dumbbell',
      bandwidthMbps: 15,
      delay: '2ms',
      lossPercent: 2,
      durationSeconds: 60,
      hostCount: 40,
      accessBandwidthMbps: 100,
      accessDelay: '1ms',
      maxQueuePackets: 100,
    });
    expect(config.outputDir).toBeNull();
    expect(config.sampleTickMs).toBe(1000);
    expect(config.statusPort).toBe(0);
    expect(config.traffic.readyPattern).toBeNull();
    expect(config.traffic.serverCommand).toEqual(['python3', 'quic_server.py']);
  });

  it('reads experiment parameters from strings', () => {
    const config = loadConfig({
      TOPOLOGY: 'multibottleneck',
      BW_MBPS: '35',
      DELAY: '500us',
      LOSS_PCT: '0.5',
      HOSTS: '8',
      OUTPUT_DIR: '',
    });

    expect(config.experiment.topology).toBe('multibottleneck');
    expect(config.experiment.bandwidthMbps).toBe(35);
    expect(config.experiment.delay).toBe('500us');
    expect(config.experiment.lossPercent).toBe(0.5);
    expect(config.experiment.hostCount).toBe(8);
    expect(config.outputDir).toBeNull();
  });

  it('splits process commands on whitespace', () => {
    const config = loadConfig({
      SERVER_COMMAND: '  ./bin/server   --quiet ',
      CLIENT_COMMAND: './bin/client',
      SERVER_READY_PATTERN: 'listening on \\d+',
    });

    expect(config.traffic.serverCommand).toEqual(['./bin/server', '--quiet']);
    expect(config.traffic.clientCommand).toEqual(['./bin/client']);
    expect(config.traffic.readyPattern?.test('listening on 4433')).toBe(true);
  });

  it('rejects an odd host count', () => {
    expect(() => loadConfig({ HOSTS: '3' })).toThrow('host count must be even');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ BW_MBPS: '-5' })).toThrow(ZodError);
    expect(() => loadConfig({ DELAY: 'fast' })).toThrow(ZodError);
    expect(() => loadConfig({ TOPOLOGY: 'ring' })).toThrow(ZodError);
    expect(() => loadConfig({ SERVER_COMMAND: '   ' })).toThrow(ZodError);
  });
});
