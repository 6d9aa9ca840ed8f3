// Public API of site-certs
export * from './lib/errors.js';
export * from './lib/config.js';
export * from './lib/domain.js';
export * from './lib/operations.js';
export * from './lib/constants/defaults.js';
export { SpawnCommandRunner, runChecked } from './lib/process/command-runner.js';
export type { CommandResult, CommandRunner } from './lib/process/command-runner.js';
export { CertbotClient } from './lib/certbot/certbot-client.js';
export type { CertbotCallOptions, CertbotClientOptions } from './lib/certbot/certbot-client.js';
export { CertificateStore, parseEndDate } from './lib/certificates/certificate-store.js';
export { NginxSites } from './lib/sites/nginx-sites.js';
export type { NginxSitesOptions } from './lib/sites/nginx-sites.js';
export { ensureSiteConfig, renderSiteConfig } from './lib/sites/site-config.js';
export type { SiteTemplateOptions, WebServer } from './lib/sites/types.js';
export { setLogger, logWarn } from './logger.js';
