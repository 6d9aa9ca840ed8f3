import { Command, CommanderError } from 'commander';
import pkg from '../../package.json';
import { handleError } from './utils/errors.js';
import { createDefaultContext, type CliContext, type DomainCommandOptions } from './context.js';
import { handleGetStatus } from './commands/get-status.js';
import { handleRevokeCommand } from './commands/revoke.js';
import { handleObtainCommand } from './commands/obtain.js';

export type CommandName = 'get-status' | 'revoke' | 'obtain';

/** Build a Commander program instance for the site-certs CLI. */
export function createCli(ctx: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name('site-certs')
    .description("Obtain, inspect and revoke Let's Encrypt certificates for nginx sites")
    .version(pkg.version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.io.out(text),
      writeErr: (text) => ctx.io.err(text),
    });

  // Commands exit 1 after reporting; commander's own usage errors keep their code
  async function run(task: () => Promise<void>) {
    try {
      await task();
    } catch (e) {
      handleError(e, ctx.io);
      ctx.exit(1);
    }
  }

  const commands: Record<CommandName, (cmd: Command) => void> = {
    'get-status': (cmd) =>
      cmd
        .description('Print certificate and site status of every domain as JSON')
        .action(() => run(() => handleGetStatus(ctx))),
    revoke: (cmd) =>
      cmd
        .description('Revoke the certificate of a domain and disable its site')
        .requiredOption('-d, --domain <domain>', 'Domain whose certificate is revoked')
        .option('--staging', "Use Let's Encrypt staging environment")
        .action((opts: DomainCommandOptions) =>
          run(() => handleRevokeCommand(ctx, { domain: opts.domain, staging: opts.staging })),
        ),
    obtain: (cmd) =>
      cmd
        .description('Obtain a certificate for a domain and enable its site')
        .requiredOption('-d, --domain <domain>', 'Domain to obtain a certificate for')
        .option('--staging', "Use Let's Encrypt staging environment")
        .action((opts: DomainCommandOptions) =>
          run(() => handleObtainCommand(ctx, { domain: opts.domain, staging: opts.staging })),
        ),
  };

  for (const [name, register] of Object.entries(commands)) {
    register(program.command(name));
  }

  return program;
}

/** Parse arguments and run the selected command. */
export async function runCli(argv: string[], ctx: CliContext = createDefaultContext()): Promise<Command> {
  const program = createCli(ctx);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    if (!(err instanceof CommanderError)) throw err;
    // help and version already went to stdout
    if (err.code !== 'commander.helpDisplayed' && err.code !== 'commander.version') {
      ctx.exit(err.exitCode);
    }
  }
  return program;
}
