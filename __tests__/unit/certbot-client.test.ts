import { describe, it, expect } from '@jest/globals';
import { CertbotClient } from '../../src/lib/certbot/certbot-client.js';
import { ExternalCommandError } from '../../src/lib/errors.js';
import { ScriptedRunner } from '../utils/fakes.js';

const baseOptions = {
  certbotBin: 'certbot',
  liveDir: '/etc/letsencrypt/live',
  webroot: '/var/www/letsencrypt',
};

describe('CertbotClient', () => {
  it('builds webroot issuance arguments without an account email', () => {
    const client = new CertbotClient(new ScriptedRunner(), baseOptions);
    expect(client.certonlyArgs('example.org', { staging: false })).toEqual([
      'certonly',
      '--webroot',
      '-w',
      '/var/www/letsencrypt',
      '-d',
      'example.org',
      '--non-interactive',
      '--agree-tos',
      '--register-unsafely-without-email',
    ]);
  });

  it('adds the email and staging flags when set', () => {
    const client = new CertbotClient(new ScriptedRunner(), {
      ...baseOptions,
      email: 'ops@example.org',
    });
    expect(client.certonlyArgs('example.org', { staging: true }).slice(-3)).toEqual([
      '--email',
      'ops@example.org',
      '--staging',
    ]);
  });

  it('revokes through the live certificate path', () => {
    const client = new CertbotClient(new ScriptedRunner(), baseOptions);
    expect(client.revokeArgs('example.org', { staging: true })).toEqual([
      'revoke',
      '--cert-path',
      '/etc/letsencrypt/live/example.org/cert.pem',
      '--non-interactive',
      '--staging',
    ]);
  });

  it('runs the configured certbot binary', async () => {
    const runner = new ScriptedRunner();
    const client = new CertbotClient(runner, { ...baseOptions, certbotBin: '/opt/certbot/bin/certbot' });
    await client.revoke('example.org', { staging: false });
    expect(runner.calls).toEqual([
      {
        command: '/opt/certbot/bin/certbot',
        args: ['revoke', '--cert-path', '/etc/letsencrypt/live/example.org/cert.pem', '--non-interactive'],
      },
    ]);
  });

  it('fails when certbot exits non-zero', async () => {
    const runner = new ScriptedRunner().fail('certbot', 'Challenge failed\n');
    const client = new CertbotClient(runner, baseOptions);
    await expect(client.certonly('example.org', { staging: false })).rejects.toBeInstanceOf(
      ExternalCommandError,
    );
  });
});
