/**
 * Default configuration constants for site-certs
 *
 * Filesystem layout and external programs used when no environment override
 * is provided. See `resolveConfig` for the matching variables.
 */

// certbot layout
export const DEFAULT_LIVE_DIR = '/etc/letsencrypt/live';
export const DEFAULT_WEBROOT = '/var/www/letsencrypt';

// nginx layout
export const DEFAULT_SITES_AVAILABLE = '/etc/nginx/sites-available';
export const DEFAULT_SITES_ENABLED = '/etc/nginx/sites-enabled';
export const DEFAULT_RELOAD_COMMAND = 'nginx -s reload';

// Platform backend proxied by every generated site
export const DEFAULT_UPSTREAM = 'http://127.0.0.1:8080';

// External programs
export const DEFAULT_CERTBOT_BIN = 'certbot';
export const DEFAULT_OPENSSL_BIN = 'openssl';

// Files inside a live certificate directory
export const CERT_FILE = 'cert.pem';
export const FULLCHAIN_FILE = 'fullchain.pem';
export const PRIVKEY_FILE = 'privkey.pem';
