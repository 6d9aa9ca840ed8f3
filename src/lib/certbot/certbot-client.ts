import { join } from 'path';
import { CERT_FILE } from '../constants/defaults.js';
import { runChecked, type CommandRunner } from '../process/command-runner.js';
import { debugCertbot } from '../../logger.js';

export interface CertbotClientOptions {
  certbotBin: string;
  liveDir: string;
  webroot: string;
  email?: string;
}

/** Per-call switches shared by issuance and revocation. */
export interface CertbotCallOptions {
  /** Use the Let's Encrypt staging endpoint */
  staging: boolean;
}

/**
 * Drives the certbot executable. Every call throws ExternalCommandError on a
 * non-zero exit; nothing is retried.
 */
export class CertbotClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CertbotClientOptions,
  ) {}

  certonlyArgs(domain: string, { staging }: CertbotCallOptions): string[] {
    const args = [
      'certonly',
      '--webroot',
      '-w',
      this.options.webroot,
      '-d',
      domain,
      '--non-interactive',
      '--agree-tos',
    ];
    if (this.options.email) args.push('--email', this.options.email);
    else args.push('--register-unsafely-without-email');
    if (staging) args.push('--staging');
    return args;
  }

  revokeArgs(domain: string, { staging }: CertbotCallOptions): string[] {
    const args = [
      'revoke',
      '--cert-path',
      join(this.options.liveDir, domain, CERT_FILE),
      '--non-interactive',
    ];
    if (staging) args.push('--staging');
    return args;
  }

  async certonly(domain: string, options: CertbotCallOptions): Promise<void> {
    debugCertbot('requesting certificate for %s (staging=%s)', domain, options.staging);
    await runChecked(this.runner, this.options.certbotBin, this.certonlyArgs(domain, options));
  }

  async revoke(domain: string, options: CertbotCallOptions): Promise<void> {
    debugCertbot('revoking certificate for %s (staging=%s)', domain, options.staging);
    await runChecked(this.runner, this.options.certbotBin, this.revokeArgs(domain, options));
  }
}
