import { existsSync, lstatSync, mkdirSync, symlinkSync, unlinkSync } from 'fs';
import { join } from 'path';
import { runChecked, type CommandRunner } from '../process/command-runner.js';
import type { WebServer } from './types.js';
import { debugSites, logWarn } from '../../logger.js';

export interface NginxSitesOptions {
  sitesAvailable: string;
  sitesEnabled: string;
  reloadCommand: readonly [string, ...string[]];
}

// lstat so that a dangling link still counts as enabled
function isPresent(path: string): boolean {
  return lstatSync(path, { throwIfNoEntry: false }) !== undefined;
}

/**
 * Debian-style nginx layout: a site is enabled when sites-enabled holds an
 * entry for it, normally a symlink into sites-available.
 */
export class NginxSites implements WebServer {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: NginxSitesOptions,
  ) {}

  async isEnabled(domain: string): Promise<boolean> {
    return isPresent(join(this.options.sitesEnabled, domain));
  }

  async enable(domain: string): Promise<void> {
    const link = join(this.options.sitesEnabled, domain);
    if (!isPresent(link)) {
      const target = join(this.options.sitesAvailable, domain);
      if (!existsSync(target)) logWarn(`enabling ${domain} without a site config at ${target}`);
      mkdirSync(this.options.sitesEnabled, { recursive: true });
      symlinkSync(target, link);
      debugSites('linked %s -> %s', link, target);
    }
    await this.reload();
  }

  async disable(domain: string): Promise<void> {
    const link = join(this.options.sitesEnabled, domain);
    if (isPresent(link)) {
      unlinkSync(link);
      debugSites('removed %s', link);
    }
    await this.reload();
  }

  private async reload(): Promise<void> {
    const [command, ...args] = this.options.reloadCommand;
    await runChecked(this.runner, command, args);
  }
}
