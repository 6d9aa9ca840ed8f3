import debug from 'debug';

// Enable with DEBUG=site-certs:* (output goes to stderr)
const NAMESPACE = 'site-certs';

let logger: ((message: string) => void) | undefined;

export const debugCommand = debug(`${NAMESPACE}:command`);
export const debugCertbot = debug(`${NAMESPACE}:certbot`);
export const debugSites = debug(`${NAMESPACE}:sites`);
export const debugStatus = debug(`${NAMESPACE}:status`);

const debugMain = debug(NAMESPACE);

/** Route warnings to an additional sink, e.g. a host framework's log. */
export function setLogger(fn: ((message: string) => void) | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (logger) {
    logger(warnMessage);
  }

  debugMain(warnMessage, ...args);
}
