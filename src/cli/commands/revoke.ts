import { revoke } from '../../lib/operations.js';
import type { CliContext, DomainCommandOptions } from '../context.js';

/** Revoke a domain's certificate and disable its site. Silent on success. */
export async function handleRevokeCommand(ctx: CliContext, options: DomainCommandOptions): Promise<void> {
  await revoke(ctx.services(), options.domain, { staging: options.staging === true });
}
