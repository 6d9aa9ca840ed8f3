import { InvalidDomainError } from './errors.js';

const LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * Normalize and check a hostname before it reaches certbot or a file path.
 * @returns the lower-cased domain
 */
export function assertValidDomain(input: string): string {
  const domain = input.trim().toLowerCase();
  if (!domain) throw InvalidDomainError.invalid(input, 'domain is empty');
  if (domain.length > 253) throw InvalidDomainError.invalid(input, 'longer than 253 characters');
  if (domain.startsWith('*.')) {
    throw InvalidDomainError.invalid(input, 'wildcards cannot be validated through a webroot');
  }

  const labels = domain.split('.');
  if (labels.length < 2) throw InvalidDomainError.invalid(input, 'expected at least two labels');
  for (const label of labels) {
    if (!LABEL.test(label)) throw InvalidDomainError.invalid(input, `bad label "${label}"`);
  }
  return domain;
}
