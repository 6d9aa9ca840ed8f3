import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { lstatSync, mkdirSync, readlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { NginxSites } from '../../src/lib/sites/nginx-sites.js';
import { ExternalCommandError } from '../../src/lib/errors.js';
import { setLogger } from '../../src/logger.js';
import { ScriptedRunner, createSandbox, type Sandbox } from '../utils/fakes.js';

describe('NginxSites', () => {
  let sandbox: Sandbox;
  let runner: ScriptedRunner;
  let sites: NginxSites;

  beforeEach(() => {
    sandbox = createSandbox();
    runner = new ScriptedRunner();
    sites = new NginxSites(runner, {
      sitesAvailable: sandbox.sitesAvailable,
      sitesEnabled: sandbox.sitesEnabled,
      reloadCommand: ['nginx', '-s', 'reload'],
    });
    mkdirSync(sandbox.sitesAvailable, { recursive: true });
    writeFileSync(join(sandbox.sitesAvailable, 'example.org'), 'server {}\n');
  });

  afterEach(() => {
    setLogger(undefined);
    sandbox.cleanup();
  });

  it('reports a site without a link as disabled', async () => {
    await expect(sites.isEnabled('example.org')).resolves.toBe(false);
  });

  it('enables by linking into sites-enabled and reloading', async () => {
    await sites.enable('example.org');

    const link = join(sandbox.sitesEnabled, 'example.org');
    expect(lstatSync(link).isSymbolicLink()).toBe(true);
    expect(readlinkSync(link)).toBe(join(sandbox.sitesAvailable, 'example.org'));
    expect(runner.calls).toEqual([{ command: 'nginx', args: ['-s', 'reload'] }]);
    await expect(sites.isEnabled('example.org')).resolves.toBe(true);
  });

  it('keeps an existing link when enabling again', async () => {
    await sites.enable('example.org');
    await sites.enable('example.org');
    expect(runner.callsTo('nginx')).toHaveLength(2);
    await expect(sites.isEnabled('example.org')).resolves.toBe(true);
  });

  it('disables by removing the link', async () => {
    await sites.enable('example.org');
    await sites.disable('example.org');
    await expect(sites.isEnabled('example.org')).resolves.toBe(false);
    expect(runner.callsTo('nginx')).toHaveLength(2);
  });

  it('disabling a site that is not enabled only reloads', async () => {
    await sites.disable('example.org');
    expect(runner.calls).toEqual([{ command: 'nginx', args: ['-s', 'reload'] }]);
  });

  it('surfaces a failed reload', async () => {
    runner.fail('nginx', 'nginx: [emerg] unexpected "}"\n');
    await expect(sites.enable('example.org')).rejects.toBeInstanceOf(ExternalCommandError);
    await expect(sites.isEnabled('example.org')).resolves.toBe(true);
  });

  it('warns when enabling a domain without a site config', async () => {
    const warn = jest.fn<(message: string) => void>();
    setLogger(warn);
    await sites.enable('other.example.org');
    expect(warn).toHaveBeenCalledWith(
      `WARN: enabling other.example.org without a site config at ${join(sandbox.sitesAvailable, 'other.example.org')}`,
    );
  });
});
