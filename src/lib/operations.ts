import { CertbotClient, type CertbotCallOptions } from './certbot/certbot-client.js';
import { CertificateStore } from './certificates/certificate-store.js';
import type { SiteCertsConfig } from './config.js';
import { assertValidDomain } from './domain.js';
import { SpawnCommandRunner, type CommandRunner } from './process/command-runner.js';
import { NginxSites } from './sites/nginx-sites.js';
import { ensureSiteConfig } from './sites/site-config.js';
import type { SiteTemplateOptions, WebServer } from './sites/types.js';
import { debugStatus } from '../logger.js';

/** Status of one domain, keyed the way the host platform reads it. */
export interface CertificateStatus {
  certificate_available: boolean;
  expiry_date: string;
  web_enabled: boolean;
}

export interface StatusReport {
  domains: Record<string, CertificateStatus>;
}

/** Collaborators of the lifecycle operations. */
export interface SiteCertsServices {
  certificates: CertificateStore;
  certbot: CertbotClient;
  webServer: WebServer;
  sitesAvailable: string;
  template: SiteTemplateOptions;
}

export type LifecycleOptions = CertbotCallOptions;

/** Wire the default collaborators for a configuration. */
export function createServices(
  config: SiteCertsConfig,
  runner: CommandRunner = new SpawnCommandRunner(),
): SiteCertsServices {
  return {
    certificates: new CertificateStore(runner, config.liveDir, config.opensslBin),
    certbot: new CertbotClient(runner, {
      certbotBin: config.certbotBin,
      liveDir: config.liveDir,
      webroot: config.webroot,
      email: config.email,
    }),
    webServer: new NginxSites(runner, {
      sitesAvailable: config.sitesAvailable,
      sitesEnabled: config.sitesEnabled,
      reloadCommand: config.reloadCommand,
    }),
    sitesAvailable: config.sitesAvailable,
    template: {
      liveDir: config.liveDir,
      webroot: config.webroot,
      upstream: config.upstream,
    },
  };
}

/**
 * Collect certificate and site state for every domain in the store.
 * An openssl failure on any domain aborts the whole report.
 */
export async function getStatus(services: SiteCertsServices): Promise<StatusReport> {
  const domains: Record<string, CertificateStatus> = {};
  for (const domain of services.certificates.listDomains()) {
    const expiryDate = await services.certificates.readExpiryDate(domain);
    const webEnabled = await services.webServer.isEnabled(domain);
    debugStatus('%s expires %s, enabled=%s', domain, expiryDate, webEnabled);
    domains[domain] = {
      certificate_available: true,
      expiry_date: expiryDate,
      web_enabled: webEnabled,
    };
  }
  return { domains };
}

/** Revoke the domain's certificate, then take its site offline. */
export async function revoke(
  services: SiteCertsServices,
  domainInput: string,
  options: LifecycleOptions,
): Promise<void> {
  const domain = assertValidDomain(domainInput);
  await services.certbot.revoke(domain, options);
  await services.webServer.disable(domain);
}

/** Issue a certificate through the webroot challenge, then serve the site over HTTPS. */
export async function obtain(
  services: SiteCertsServices,
  domainInput: string,
  options: LifecycleOptions,
): Promise<void> {
  const domain = assertValidDomain(domainInput);
  await services.certbot.certonly(domain, options);
  ensureSiteConfig(services.sitesAvailable, domain, services.template);
  await services.webServer.enable(domain);
}
