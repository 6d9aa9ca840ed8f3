import { obtain } from '../../lib/operations.js';
import type { CliContext, DomainCommandOptions } from '../context.js';

/** Issue a certificate for a domain, write its site config if missing, enable it. */
export async function handleObtainCommand(ctx: CliContext, options: DomainCommandOptions): Promise<void> {
  await obtain(ctx.services(), options.domain, { staging: options.staging === true });
}
