/**
 * Proxmox guest tag handling
 *
 * Tags arrive as one `;`-separated string. Recognized entries:
 *   dnsherpa-skip                 leave the guest alone
 *   dnsherpa-ip:<ip>[,<ip>...]    publish exactly these addresses
 *   dnsherpa-interface:<name>     read addresses from this interface
 */
export const TAG_SKIP = 'dnsherpa-skip';
export const TAG_IP = 'dnsherpa-ip';
export const TAG_INTERFACE = 'dnsherpa-interface';

export function parseTags(raw: string | undefined): Set<string> {
  const tags = new Set<string>();
  if (!raw) return tags;

  for (const entry of raw.split(';')) {
    const tag = entry.trim();
    if (tag) {
      tags.add(tag);
    }
  }

  return tags;
}

export function hasTag(tags: ReadonlySet<string>, tag: string): boolean {
  return tags.has(tag);
}

/**
 * Value of the first `<name>:<value>` tag, or undefined
 */
export function getTagValue(tags: ReadonlySet<string>, name: string): string | undefined {
  const prefix = `${name}:`;
  for (const tag of tags) {
    if (tag.startsWith(prefix)) {
      return tag.slice(prefix.length).trim();
    }
  }
  return undefined;
}
