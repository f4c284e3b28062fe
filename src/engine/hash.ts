// Canonical JSON and content hashes for resolved states.

import { createHash } from 'node:crypto';

/**
 * JSON with object keys sorted at every depth and null/undefined members
 * dropped, so equal states always produce equal text.
 */
export function canonicalStringify(input: unknown): string {
  return JSON.stringify(normalize(input));
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalize);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    const keys = Object.keys(value).sort();
    const entries = new Map<string, unknown>(Object.entries(value));
    for (const key of keys) {
      const member = entries.get(key);
      if (member === null || member === undefined) continue;
      out[key] = normalize(member);
    }
    return out;
  }
  return value;
}

export function hashSha256(text: string): string {
  return `sha256:${createHash('sha256').update(text, 'utf8').digest('hex')}`;
}

export function hashGameState(state: unknown): string {
  return hashSha256(canonicalStringify(state));
}
