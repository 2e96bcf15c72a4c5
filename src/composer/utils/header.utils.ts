import type { AddressObject } from 'mailparser';
import { UNKNOWN_SENDER } from '../composer.constants';

/**
 * Collapses runs of whitespace left between decoded header segments into
 * single spaces and trims the ends.
 *
 * @example
 * ```
 * normalizeHeaderText('  Weekly \t  digest ') // 'Weekly digest'
 * ```
 */
export function normalizeHeaderText(value: string | undefined): string {
  if (!value) {
    return '';
  }
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Renders a decoded From header as `Name <address>` entries.
 */
export function formatSender(from: AddressObject | AddressObject[] | undefined): string {
  const objects = Array.isArray(from) ? from : from ? [from] : [];

  const entries = objects
    .flatMap((object) => object.value)
    .map((entry) => {
      const name = normalizeHeaderText(entry.name);
      const address = entry.address ?? '';
      if (name && address) {
        return `${name} <${address}>`;
      }
      return name || address;
    })
    .filter((entry) => entry.length > 0);

  return entries.length > 0 ? entries.join(', ') : UNKNOWN_SENDER;
}
