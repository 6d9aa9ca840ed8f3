import { getStatus } from '../../lib/operations.js';
import type { CliContext } from '../context.js';

/** Print the status of every certificate as one JSON object. */
export async function handleGetStatus(ctx: CliContext): Promise<void> {
  const report = await getStatus(ctx.services());
  ctx.io.out(JSON.stringify(report) + '\n');
}
