/**
 * Input validation for wizard answers
 *
 * Each `*Issue` check returns a message for an unacceptable value, or
 * undefined. The zod schemas in tools/shared apply them as refinements.
 */

/** 32 hex characters, a dash, and a two-character checksum */
const CID_PATTERN = /^[0-9A-F]{32}-[0-9A-F]{2}$/;
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const REGISTRY_PATTERN = /^[A-Za-z0-9]([A-Za-z0-9.-]*[A-Za-z0-9])?(:[0-9]{1,5})?(\/[a-z0-9._/-]+)?$/;

export function cidIssue(value: string): string | undefined {
  return CID_PATTERN.test(value.trim().toUpperCase())
    ? undefined
    : 'CID must be 32 hex characters followed by a dash and a 2-character checksum';
}

export function namespaceIssue(value: string): string | undefined {
  if (value.length > 63) return 'Namespace must be 63 characters or less';
  if (!NAMESPACE_PATTERN.test(value)) {
    return 'Namespace must contain only lowercase letters, numbers, and hyphens';
  }
  return undefined;
}

export function imageTagIssue(value: string): string | undefined {
  return TAG_PATTERN.test(value) ? undefined : 'Image tag contains characters Docker does not accept';
}

export function registryIssue(value: string): string | undefined {
  if (/^https?:\/\//.test(value)) return 'Registry must be a host, without http:// or https://';
  return REGISTRY_PATTERN.test(value) ? undefined : 'Registry must look like host[:port][/path]';
}

export function requiredIssue(label: string) {
  return (value: string): string | undefined =>
    value.trim() === '' ? `${label} is required` : undefined;
}

/**
 * Numeric components of a version string. Pre-release and build suffixes
 * after the first dash are ignored; unparseable input yields `[0]`.
 */
export function parseVersionParts(version: string): number[] {
  const core = version.replace(/^v/, '').split('-')[0] ?? '';
  const parts = core.split('.').map((part) => Number.parseInt(part, 10));
  if (parts.length === 0 || parts.some((part) => Number.isNaN(part))) {
    return [0];
  }
  return parts;
}

/**
 * Compare two version strings component-wise. Missing components count as 0.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersionParts(a);
  const right = parseVersionParts(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}
