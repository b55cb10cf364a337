import { mkdtemp, readFile, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProvisioningError } from '@netexp/common';
import { CertificateProvisioner } from '../../src/certificates.js';
import type { CommandRunner } from '../../src/commands.js';

function argAfter(args: readonly string[], flag: string): string {
  const index = args.indexOf(flag);
  if (index === -1) {
    throw new Error(`missing ${flag}`);
  }
  return args[index + 1];
}

const fakeOpenssl: CommandRunner = async (_file, args) => {
  await writeFile(argAfter(args, '-out'), 'CERT');
  await writeFile(argAfter(args, '-keyout'), 'KEY');
  return '';
};

describe('CertificateProvisioner', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'netexp-certs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('generates a self-signed pair with openssl', async () => {
    const run = vi.fn(fakeOpenssl);
    const certDir = join(dir, 'certs');

    const bundle = await new CertificateProvisioner(certDir, run).ensure();

    expect(bundle).toEqual({ certPath: join(certDir, 'cert.pem'), keyPath: join(certDir, 'key.pem') });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toBe('openssl');
    expect(run.mock.calls[0][1]).toEqual([
      'req', '-new', '-x509', '-days', '30', '-nodes',
      '-out', bundle.certPath,
      '-keyout', bundle.keyPath,
      '-subj', '/CN=localhost',
    ]);
    expect(await readFile(bundle.certPath, 'utf-8')).toBe('CERT');
  });

  it('reuses an existing pair', async () => {
    await writeFile(join(dir, 'cert.pem'), 'OLD-CERT');
    await writeFile(join(dir, 'key.pem'), 'OLD-KEY');
    const run = vi.fn(fakeOpenssl);

    await new CertificateProvisioner(dir, run).ensure();

    expect(run).not.toHaveBeenCalled();
  });

  it('replaces a pair close to expiry', async () => {
    await writeFile(join(dir, 'cert.pem'), 'OLD-CERT');
    await writeFile(join(dir, 'key.pem'), 'OLD-KEY');
    const issued = new Date(Date.now() - 29.5 * 24 * 60 * 60 * 1000);
    await utimes(join(dir, 'cert.pem'), issued, issued);
    const run = vi.fn(fakeOpenssl);

    const bundle = await new CertificateProvisioner(dir, run).ensure();

    expect(run).toHaveBeenCalledTimes(1);
    expect(await readFile(bundle.certPath, 'utf-8')).toBe('CERT');
    expect(await readFile(bundle.keyPath, 'utf-8')).toBe('KEY');
  });

  it('reports a failed openssl run as a provisioning error', async () => {
    const run: CommandRunner = async () => {
      throw new Error('openssl: command not found');
    };

    const attempt = new CertificateProvisioner(dir, run).ensure();

    await expect(attempt).rejects.toBeInstanceOf(ProvisioningError);
    await expect(attempt).rejects.toThrow('Certificate generation failed: openssl: command not found');
  });

  it('rejects an empty key file', async () => {
    const run: CommandRunner = async (_file, args) => {
      await writeFile(argAfter(args, '-out'), 'CERT');
      await writeFile(argAfter(args, '-keyout'), '');
      return '';
    };

    await expect(new CertificateProvisioner(dir, run).ensure()).rejects.toThrow('no usable key/certificate pair');
  });
});
