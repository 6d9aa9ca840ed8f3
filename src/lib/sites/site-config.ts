import { lstatSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FULLCHAIN_FILE, PRIVKEY_FILE } from '../constants/defaults.js';
import type { SiteTemplateOptions } from './types.js';
import { debugSites } from '../../logger.js';

/** nginx server blocks for one domain: HTTP for the ACME webroot, HTTPS proxying the platform. */
export function renderSiteConfig(domain: string, options: SiteTemplateOptions): string {
  const certDir = join(options.liveDir, domain);
  return `server {
    listen 80;
    listen [::]:80;
    server_name ${domain};

    location /.well-known/acme-challenge/ {
        root ${options.webroot};
    }

    location / {
        return 301 https://$host$request_uri;
    }
}

server {
    listen 443 ssl;
    listen [::]:443 ssl;
    server_name ${domain};

    ssl_certificate ${join(certDir, FULLCHAIN_FILE)};
    ssl_certificate_key ${join(certDir, PRIVKEY_FILE)};

    location / {
        proxy_pass ${options.upstream};
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }
}
`;
}

/**
 * Write the site configuration for a domain unless one is already there.
 * An existing file is never regenerated, even if the template changed.
 * @returns true when a file was written
 */
export function ensureSiteConfig(
  sitesAvailable: string,
  domain: string,
  options: SiteTemplateOptions,
): boolean {
  const path = join(sitesAvailable, domain);
  // lstat: a dangling link is an existing entry too
  if (lstatSync(path, { throwIfNoEntry: false }) !== undefined) {
    debugSites('keeping existing site config %s', path);
    return false;
  }
  mkdirSync(sitesAvailable, { recursive: true });
  try {
    writeFileSync(path, renderSiteConfig(domain, options), { flag: 'wx' });
  } catch (err) {
    if (isAlreadyExists(err)) {
      debugSites('site config %s appeared before writing, keeping it', path);
      return false;
    }
    throw err;
  }
  debugSites('wrote site config %s', path);
  return true;
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}
