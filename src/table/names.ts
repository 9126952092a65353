/**
 * Name helpers shared by the table, the monitor and static records
 */

const MAX_NAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;
const LABEL_PATTERN = /^[a-z0-9_-]+$/;

/**
 * Canonical table key for a name: lower-cased, one trailing dot stripped,
 * every label non-empty and made of domain characters.
 * Returns null when the name is not a valid label sequence.
 */
export function canonicalizeName(name: string): string | null {
  const lowered = name.trim().toLowerCase().replace(/\.$/, '');
  if (lowered.length === 0 || lowered.length > MAX_NAME_LENGTH) {
    return null;
  }

  const labels = lowered.split('.');
  for (const label of labels) {
    if (label.length === 0 || label.length > MAX_LABEL_LENGTH || !LABEL_PATTERN.test(label)) {
      return null;
    }
  }

  return labels.join('.');
}

/**
 * Qualify a raw container or record name with the base domain.
 * Characters outside [A-Za-z0-9_.-] are dropped first.
 */
export function qualifyName(raw: string, domain: string): string | null {
  const cleaned = raw.replace(/[^A-Za-z0-9_.-]/g, '').replace(/\.$/, '');
  if (cleaned.length === 0) {
    return null;
  }
  return `${cleaned}.${domain}`;
}
