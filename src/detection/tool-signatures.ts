/**
 * Client fingerprints from the User-Agent header.
 *
 * Known scanners are matched first, in table order. Anything that looks
 * like a browser is then classed as `browser`, and generic crawlers as
 * `bot`.
 */

import type { ScannerTool, ToolName } from '../types/log-event.js';

export interface ToolSignature {
  tool: ScannerTool;
  pattern: RegExp;
}

export const TOOL_SIGNATURES: readonly ToolSignature[] = [
  { tool: 'sqlmap', pattern: /\bsqlmap\b/i },
  { tool: 'curl', pattern: /\bcurl\/\d/i },
  { tool: 'python-requests', pattern: /\bpython-requests\b/i },
  { tool: 'go-http-client', pattern: /\bgo-http-client\b/i },
  { tool: 'nikto', pattern: /\bnikto\b/i },
  { tool: 'acunetix', pattern: /\bacunetix\b/i },
  { tool: 'nmap', pattern: /\bnmap\b/i },
  { tool: 'masscan', pattern: /\bmasscan\b/i },
  { tool: 'wget', pattern: /\bwget\/\d/i },
  { tool: 'gobuster', pattern: /\bgobuster\b/i },
  { tool: 'dirbuster', pattern: /\bdirbuster\b/i },
  { tool: 'burpsuite', pattern: /\bburp\b/i },
  { tool: 'zaproxy', pattern: /\bzap\b/i },
  { tool: 'wpscan', pattern: /\bwpscan\b/i },
  { tool: 'metasploit', pattern: /\bmetasploit\b/i },
  { tool: 'nuclei', pattern: /\bnuclei\b/i },
  { tool: 'sqlninja', pattern: /\bsqlninja\b/i },
  { tool: 'havij', pattern: /\bhavij\b/i },
  { tool: 'httperf', pattern: /\bhttperf\b/i },
  { tool: 'jmeter', pattern: /\bjmeter\b/i },
];

/** Case-sensitive markers of a browser User-Agent. */
const BROWSER_MARKERS = ['Mozilla/', 'Chrome/', 'Safari/', 'Firefox/'] as const;

const BOT_USER_AGENT =
  /(bot|crawler|spider|scraper|slurp|googlebot|bingbot|yandexbot|baiduspider|facebookexternalhit|twitterbot)/i;

/**
 * Identify the client tool behind a User-Agent string.
 *
 * @returns The scanner name, `browser`, `bot`, or null for an empty or
 *          unrecognised agent.
 */
export function detectTool(userAgent: string): ToolName | null {
  if (!userAgent) return null;

  for (const { tool, pattern } of TOOL_SIGNATURES) {
    if (pattern.test(userAgent)) return tool;
  }

  if (BROWSER_MARKERS.some((marker) => userAgent.includes(marker))) {
    return 'browser';
  }

  if (BOT_USER_AGENT.test(userAgent)) return 'bot';

  return null;
}

export function isBotUserAgent(userAgent: string): boolean {
  return BOT_USER_AGENT.test(userAgent);
}
