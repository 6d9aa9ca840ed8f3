import { existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { CERT_FILE } from '../constants/defaults.js';
import { runChecked, type CommandRunner } from '../process/command-runner.js';
import { debugStatus } from '../../logger.js';

/**
 * Read-only view of certbot's live directory: one subdirectory per domain.
 */
export class CertificateStore {
  constructor(
    private readonly runner: CommandRunner,
    private readonly liveDir: string,
    private readonly opensslBin: string,
  ) {}

  /** Domains with a live directory, sorted. A missing store yields none. */
  listDomains(): string[] {
    if (!existsSync(this.liveDir)) {
      debugStatus('certificate store %s does not exist', this.liveDir);
      return [];
    }
    return readdirSync(this.liveDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  certificatePath(domain: string): string {
    return join(this.liveDir, domain, CERT_FILE);
  }

  /**
   * Expiry of the domain's certificate as printed by openssl,
   * e.g. "Jan 15 12:00:00 2027 GMT".
   */
  async readExpiryDate(domain: string): Promise<string> {
    const stdout = await runChecked(this.runner, this.opensslBin, [
      'x509',
      '-enddate',
      '-noout',
      '-in',
      this.certificatePath(domain),
    ]);
    return parseEndDate(stdout);
  }
}

/** Extract the value of the notAfter= line from `openssl x509 -enddate` output. */
export function parseEndDate(output: string): string {
  const line = output.split('\n').find((l) => l.trim().startsWith('notAfter='));
  if (!line) return output.trim();
  return line.trim().slice('notAfter='.length).trim();
}
