import { mkdir, stat } from 'fs/promises';
import { join } from 'path';
import { ProvisioningError, describeError, now } from '@netexp/common';
import { runCommand, type CommandRunner } from './commands.js';
import { createLogger } from './logger.js';

const logger = createLogger('certificates');

export interface CertBundle {
  certPath: string;
  keyPath: string;
}

export const CERT_VALIDITY_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

async function nonEmpty(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size > 0;
  } catch {
    return false;
  }
}

/** Written less than `maxAgeMs` ago and not empty. */
async function fresh(path: string, maxAgeMs: number): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.size > 0 && now() - info.mtimeMs < maxAgeMs;
  } catch {
    return false;
  }
}

/**
 * Keeps one self-signed key/certificate pair in `certDir` for every server of
 * every run. An existing pair is reused until it is a day short of expiring.
 */
export class CertificateProvisioner {
  constructor(
    private readonly certDir: string,
    private readonly run: CommandRunner = runCommand
  ) {}

  get bundle(): CertBundle {
    return {
      certPath: join(this.certDir, 'cert.pem'),
      keyPath: join(this.certDir, 'key.pem'),
    };
  }

  async ensure(): Promise<CertBundle> {
    const bundle = this.bundle;

    const reusableFor = (CERT_VALIDITY_DAYS - 1) * DAY_MS;
    if ((await fresh(bundle.certPath, reusableFor)) && (await nonEmpty(bundle.keyPath))) {
      logger.debug(`Reusing certificate in ${this.certDir}`);
      return bundle;
    }

    try {
      await mkdir(this.certDir, { recursive: true });
      await this.run('openssl', [
        'req', '-new', '-x509', '-days', String(CERT_VALIDITY_DAYS), '-nodes',
        '-out', bundle.certPath,
        '-keyout', bundle.keyPath,
        '-subj', '/CN=localhost',
      ]);
    } catch (error) {
      throw new ProvisioningError(`Certificate generation failed: ${describeError(error)}`, { cause: error });
    }

    if (!(await nonEmpty(bundle.certPath)) || !(await nonEmpty(bundle.keyPath))) {
      throw new ProvisioningError(`openssl finished but ${this.certDir} has no usable key/certificate pair`);
    }

    logger.info(`Generated self-signed certificate in ${this.certDir}`);
    return bundle;
  }
}
