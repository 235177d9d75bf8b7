import type { TraceDirection } from '../shared/types.js';

export type OwnedDomainSnapshot = ReadonlySet<string>;

export const normalizeDomain = (value: string) => String(value ?? '').trim().toLowerCase().replace(/\.+$/, '');

/** Lowercases, trims and dedupes; order of first appearance is kept. */
export const normalizeDomains = (values: Iterable<string>): string[] => {
  const seen = new Set<string>();
  for (const value of values) {
    const domain = normalizeDomain(value);
    if (domain) {
      seen.add(domain);
    }
  }
  return [...seen];
};

export const createDomainSnapshot = (domains: Iterable<string>): OwnedDomainSnapshot =>
  Object.freeze(new Set(normalizeDomains(domains)));

/** Domain after the last '@', or '' for anything that is not a usable address. */
export const extractAddressDomain = (address: string) => {
  const value = String(address ?? '').trim();
  const at = value.lastIndexOf('@');
  if (at < 0) {
    return '';
  }
  return normalizeDomain(value.slice(at + 1));
};

const isOwned = (domain: string, owned: OwnedDomainSnapshot) => domain !== '' && owned.has(domain);

export const classifyDirection = (
  sender: string,
  recipient: string,
  owned: OwnedDomainSnapshot,
): TraceDirection => {
  if (owned.size === 0) {
    return 'Unknown';
  }
  const senderInternal = isOwned(extractAddressDomain(sender), owned);
  const recipientInternal = isOwned(extractAddressDomain(recipient), owned);

  if (senderInternal && recipientInternal) {
    return 'Internal';
  }
  if (senderInternal) {
    return 'Outbound';
  }
  if (recipientInternal) {
    return 'Inbound';
  }
  return 'Unknown';
};
