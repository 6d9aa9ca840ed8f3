import { resolveConfig } from '../lib/config.js';
import { createServices, type SiteCertsServices } from '../lib/operations.js';

/** Where command output goes. */
export interface CliIo {
  out(text: string): void;
  err(text: string | Uint8Array): void;
}

/** Flags shared by the commands acting on one domain. */
export interface DomainCommandOptions {
  domain: string;
  staging?: boolean;
}

/** Everything a command handler touches outside its arguments. */
export interface CliContext {
  /** Called lazily so configuration errors surface through the error handler */
  services(): SiteCertsServices;
  io: CliIo;
  exit(code: number): void;
}

export function createDefaultContext(): CliContext {
  return {
    services: () => createServices(resolveConfig(process.env)),
    io: {
      out: (text) => process.stdout.write(text),
      err: (text) => process.stderr.write(text),
    },
    exit: (code) => process.exit(code),
  };
}
