import { spawn, type ChildProcess } from 'child_process';
import { open, readFile } from 'fs/promises';
import type { CounterDirection } from '@netexp/common';
import type {
  CreatedLink,
  EmulationBackend,
  ExecOptions,
  LinkShaping,
  ProcessExit,
  ProcessHandle,
} from './backend.js';
import { runCommand, type CommandRunner } from './commands.js';
import { createLogger } from './logger.js';

const logger = createLogger('netns-backend');

type NodeKind = 'host' | 'switch';

export interface NetnsBackendOptions {
  /** Prepended to namespace and bridge names so leftovers can be recognised. */
  prefix: string;
  run?: CommandRunner;
  sysfsRoot?: string;
}

/**
 * Emulation backend on plain Linux primitives: hosts are network namespaces,
 * switches are bridges in the root namespace, links are veth pairs shaped
 * with netem on both ends. Interfaces are named `<node>-eth<n>` in the order
 * links are created, starting at 1 on every node.
 */
export class NetnsBackend implements EmulationBackend {
  private readonly prefix: string;
  private readonly run: CommandRunner;
  private readonly sysfsRoot: string;
  private nodes = new Map<string, NodeKind>();
  private addresses = new Map<string, string>();
  private addressed = new Set<string>();
  private ports = new Map<string, number>();
  private interfaceOwners = new Map<string, string>();
  private rootLinks: string[] = [];

  constructor(options: NetnsBackendOptions = { prefix: 'nx-' }) {
    this.prefix = options.prefix;
    this.run = options.run ?? runCommand;
    this.sysfsRoot = options.sysfsRoot ?? '/sys/class/net';
  }

  private namespace(hostId: string): string {
    return `${this.prefix}${hostId}`;
  }

  private bridge(switchId: string): string {
    return `${this.prefix}${switchId}`;
  }

  async createHost(id: string, address: string): Promise<void> {
    const ns = this.namespace(id);
    await this.run('ip', ['netns', 'add', ns]);
    this.nodes.set(id, 'host');
    this.addresses.set(id, address);
    await this.run('ip', ['-n', ns, 'link', 'set', 'lo', 'up']);
  }

  async createSwitch(id: string): Promise<void> {
    const name = this.bridge(id);
    await this.run('ip', ['link', 'add', 'name', name, 'type', 'bridge']);
    this.nodes.set(id, 'switch');
    await this.run('ip', ['link', 'set', name, 'up']);
  }

  async createLink(endpointA: string, endpointB: string, shaping: LinkShaping): Promise<CreatedLink> {
    const interfaceA = this.nextInterface(endpointA);
    const interfaceB = this.nextInterface(endpointB);

    await this.run('ip', ['link', 'add', interfaceA, 'type', 'veth', 'peer', 'name', interfaceB]);
    if (this.nodes.get(endpointA) === 'switch' && this.nodes.get(endpointB) === 'switch') {
      this.rootLinks.push(interfaceA);
    }

    await this.attach(endpointA, interfaceA);
    await this.attach(endpointB, interfaceB);
    await this.shape(endpointA, interfaceA, shaping);
    await this.shape(endpointB, interfaceB, shaping);

    logger.debug(
      { interfaceA, interfaceB, ...shaping },
      `Link ${endpointA} <-> ${endpointB} created`
    );

    return { interfaceA, interfaceB };
  }

  async execInHost(hostId: string, command: readonly string[], options: ExecOptions): Promise<ProcessHandle> {
    if (this.nodes.get(hostId) !== 'host') {
      throw new Error(`Unknown host ${hostId}`);
    }

    const log = await open(options.logPath, 'a');
    try {
      const child = spawn('ip', ['netns', 'exec', this.namespace(hostId), ...command], {
        stdio: ['ignore', log.fd, log.fd],
      });
      return await toProcessHandle(child);
    } finally {
      await log.close();
    }
  }

  async readInterfaceCounter(interfaceId: string, direction: CounterDirection): Promise<number> {
    const owner = this.interfaceOwners.get(interfaceId);
    if (!owner) {
      throw new Error(`Interface ${interfaceId} was not created by this backend`);
    }

    const path = `${this.sysfsRoot}/${interfaceId}/statistics/${direction}_bytes`;
    const content =
      this.nodes.get(owner) === 'host'
        ? await this.run('ip', ['netns', 'exec', this.namespace(owner), 'cat', path])
        : await readFile(path, 'utf-8');

    const value = Number.parseInt(content.trim(), 10);
    if (Number.isNaN(value)) {
      throw new Error(`Counter ${path} is not a number: "${content.trim()}"`);
    }
    return value;
  }

  async hasResidualState(): Promise<boolean> {
    if (this.nodes.size > 0) {
      return true;
    }
    const listing = await this.run('ip', ['netns', 'list']);
    return listing
      .split('\n')
      .some((line) => line.trim().startsWith(this.prefix));
  }

  async destroyAll(): Promise<void> {
    const failures: unknown[] = [];

    const attempt = async (file: string, args: string[]): Promise<void> => {
      try {
        await this.run(file, args);
      } catch (error) {
        if (!isMissingObject(error)) {
          failures.push(error);
        }
      }
    };

    for (const [id, kind] of this.nodes) {
      if (kind === 'host') {
        await attempt('ip', ['netns', 'del', this.namespace(id)]);
      }
    }
    for (const name of this.rootLinks) {
      await attempt('ip', ['link', 'del', name]);
    }
    for (const [id, kind] of this.nodes) {
      if (kind === 'switch') {
        await attempt('ip', ['link', 'del', this.bridge(id)]);
      }
    }

    const removed = this.nodes.size;
    this.nodes.clear();
    this.addresses.clear();
    this.addressed.clear();
    this.ports.clear();
    this.interfaceOwners.clear();
    this.rootLinks = [];

    if (failures.length > 0) {
      throw new AggregateError(failures, `Failed to remove ${failures.length} emulation object(s)`);
    }
    logger.debug(`Removed ${removed} hosts and switches`);
  }

  private nextInterface(node: string): string {
    if (!this.nodes.has(node)) {
      throw new Error(`Unknown node ${node}`);
    }
    const port = (this.ports.get(node) ?? 0) + 1;
    this.ports.set(node, port);
    const name = `${node}-eth${port}`;
    this.interfaceOwners.set(name, node);
    return name;
  }

  private async attach(node: string, interfaceId: string): Promise<void> {
    if (this.nodes.get(node) === 'switch') {
      await this.run('ip', ['link', 'set', interfaceId, 'master', this.bridge(node)]);
      await this.run('ip', ['link', 'set', interfaceId, 'up']);
      return;
    }

    const ns = this.namespace(node);
    await this.run('ip', ['link', 'set', interfaceId, 'netns', ns]);

    const address = this.addresses.get(node);
    if (address && !this.addressed.has(node)) {
      await this.run('ip', ['-n', ns, 'addr', 'add', `${address}/8`, 'dev', interfaceId]);
      this.addressed.add(node);
    }
    await this.run('ip', ['-n', ns, 'link', 'set', interfaceId, 'up']);
  }

  private async shape(node: string, interfaceId: string, shaping: LinkShaping): Promise<void> {
    const args = [
      'qdisc', 'add', 'dev', interfaceId, 'root', 'netem',
      'rate', `${shaping.bandwidthMbps}mbit`,
      'delay', shaping.delay,
      'loss', `${shaping.lossPercent}%`,
      'limit', String(shaping.maxQueuePackets),
    ];

    if (this.nodes.get(node) === 'host') {
      await this.run('ip', ['netns', 'exec', this.namespace(node), 'tc', ...args]);
    } else {
      await this.run('tc', args);
    }
  }
}

function isMissingObject(error: unknown): boolean {
  const text = error instanceof Error ? error.message : String(error);
  return /Cannot find device|No such file or directory|does not exist/i.test(text);
}

function toProcessHandle(child: ChildProcess): Promise<ProcessHandle> {
  const exited = new Promise<ProcessExit>((resolve) => {
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });

  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('spawn', () => {
      child.off('error', reject);
      child.on('error', (error) => {
        logger.warn({ pid: child.pid, err: error }, 'Child process error');
      });

      const pid = child.pid;
      if (pid === undefined) {
        reject(new Error('Process spawned without a pid'));
        return;
      }

      resolve({
        pid,
        exited,
        kill: (signal) => child.kill(signal),
      });
    });
  });
}
