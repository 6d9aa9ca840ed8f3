import {
  DEFAULT_CERTBOT_BIN,
  DEFAULT_LIVE_DIR,
  DEFAULT_OPENSSL_BIN,
  DEFAULT_RELOAD_COMMAND,
  DEFAULT_SITES_AVAILABLE,
  DEFAULT_SITES_ENABLED,
  DEFAULT_UPSTREAM,
  DEFAULT_WEBROOT,
} from './constants/defaults.js';
import { ConfigurationError } from './errors.js';

/** Paths and programs used by one invocation. */
export interface SiteCertsConfig {
  liveDir: string;
  webroot: string;
  sitesAvailable: string;
  sitesEnabled: string;
  upstream: string;
  certbotBin: string;
  opensslBin: string;
  reloadCommand: readonly [string, ...string[]];
  email?: string;
}

type Env = Record<string, string | undefined>;

function pick(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function parseCommandLine(variable: string, line: string): [string, ...string[]] {
  const [command, ...args] = line.split(/\s+/).filter((part) => part.length > 0);
  if (!command) throw ConfigurationError.invalidValue(variable, 'command is empty');
  return [command, ...args];
}

/**
 * Build the configuration from SITE_CERTS_* environment variables, falling
 * back to the defaults for unset or blank ones.
 */
export function resolveConfig(env: Env = process.env): SiteCertsConfig {
  const email = env.SITE_CERTS_EMAIL?.trim();
  const reloadLine = env.SITE_CERTS_RELOAD ?? DEFAULT_RELOAD_COMMAND;

  return {
    liveDir: pick(env, 'SITE_CERTS_LIVE_DIR', DEFAULT_LIVE_DIR),
    webroot: pick(env, 'SITE_CERTS_WEBROOT', DEFAULT_WEBROOT),
    sitesAvailable: pick(env, 'SITE_CERTS_SITES_AVAILABLE', DEFAULT_SITES_AVAILABLE),
    sitesEnabled: pick(env, 'SITE_CERTS_SITES_ENABLED', DEFAULT_SITES_ENABLED),
    upstream: pick(env, 'SITE_CERTS_UPSTREAM', DEFAULT_UPSTREAM),
    certbotBin: pick(env, 'SITE_CERTS_CERTBOT', DEFAULT_CERTBOT_BIN),
    opensslBin: pick(env, 'SITE_CERTS_OPENSSL', DEFAULT_OPENSSL_BIN),
    reloadCommand: parseCommandLine('SITE_CERTS_RELOAD', reloadLine),
    ...(email ? { email } : {}),
  };
}
