/**
 * Attack payload signatures.
 *
 * The catalog is an ordered table of (tag, matcher) pairs. Every entry is
 * evaluated against the percent-decoded request target, so one request
 * can carry several tags. The order of the returned tags is the table
 * order.
 */

import type { AttackTag } from '../types/log-event.js';
import { percentDecode } from '../utils/url.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AttackSignature {
  tag: AttackTag;
  pattern: RegExp;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const ATTACK_SIGNATURES: readonly AttackSignature[] = [
  {
    tag: 'SQLi',
    pattern:
      /(\bunion\b|\bselect\b|\binformation_schema\b|\bsleep\s*\(|\bbenchmark\s*\(|--|\/\*|\*\/|%27|'|\bor\s+1=1\b|\band\s+1=1\b)/i,
  },
  {
    tag: 'Traversal/LFI',
    pattern: /(\.\.\/|%2e%2e%2f|%2e%2e\\|\/etc\/passwd|win\.ini|\.\.\\|%5c%2e%2e)/i,
  },
  {
    tag: 'XSS',
    pattern:
      /(<script|%3cscript|onerror=|onload=|alert\s*\(|javascript:|<iframe|<img\s+src|eval\s*\(|<svg|onmouseover=)/i,
  },
  {
    tag: 'SSRF',
    pattern:
      /(https?:\/\/|%3a%2f%2f|169\.254\.169\.254|localhost|127\.0\.0\.1|0\.0\.0\.0|::1|\[::1\]|metadata\.google\.internal)/i,
  },
  {
    tag: 'CMDi/Shell',
    pattern:
      /(\bcat\b|\bwget\b|\bcurl\b|;|\|\||&&|\/bin\/sh\b|\bpowershell\b|\bexec\b|\bsystem\b|\$\(|`|<\(|>\()/i,
  },
  {
    tag: 'RCE',
    pattern:
      /(eval\(|exec\(|system\(|passthru\(|shell_exec\(|phpinfo\(|assert\(|preg_replace\s*\(.*\/e["']?\s*,|create_function\()/i,
  },
  {
    tag: 'XXE',
    pattern: /(<!ENTITY\s+\w+\s+SYSTEM|<!DOCTYPE.*ENTITY|SYSTEM\s+["']file:|SYSTEM\s+["']http)/i,
  },
  {
    tag: 'LDAP Injection',
    pattern: /(\*\)|\(\||&\(|\|\()/,
  },
  {
    tag: 'NoSQL Injection',
    pattern: /(\$ne|\$gt|\$lt|\$where|\$regex|\[\$)/i,
  },
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Classify a raw request target against every attack category.
 *
 * @param rawTarget - Request target as written in the log (may be encoded).
 * @returns Distinct tags in catalog order; empty when nothing matched.
 */
export function detectAttacks(rawTarget: string): AttackTag[] {
  const decoded = percentDecode(rawTarget);
  const tags: AttackTag[] = [];

  for (const signature of ATTACK_SIGNATURES) {
    if (signature.pattern.test(decoded)) {
      tags.push(signature.tag);
    }
  }

  return tags;
}
