/**
 * Types for parsed access-log events and the signature catalog labels
 * attached to them.
 */

// ---------------------------------------------------------------------------
// Signature labels
// ---------------------------------------------------------------------------

/** Attack categories, in catalog evaluation order. */
export const ATTACK_TAGS = [
  'SQLi',
  'Traversal/LFI',
  'XSS',
  'SSRF',
  'CMDi/Shell',
  'RCE',
  'XXE',
  'LDAP Injection',
  'NoSQL Injection',
] as const;

export type AttackTag = (typeof ATTACK_TAGS)[number];

/** Known scanning and automation tools, in match priority order. */
export const SCANNER_TOOLS = [
  'sqlmap',
  'curl',
  'python-requests',
  'go-http-client',
  'nikto',
  'acunetix',
  'nmap',
  'masscan',
  'wget',
  'gobuster',
  'dirbuster',
  'burpsuite',
  'zaproxy',
  'wpscan',
  'metasploit',
  'nuclei',
  'sqlninja',
  'havij',
  'httperf',
  'jmeter',
] as const;

export type ScannerTool = (typeof SCANNER_TOOLS)[number];

export type ToolName = ScannerTool | 'browser' | 'bot';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * An instant read from a bracketed access-log timestamp.
 *
 * `offsetMinutes` is the UTC offset written in the log (0 when the log
 * carried none) so the wall clock the server saw can be recovered.
 */
export interface LogTimestamp {
  epochMs: number;
  offsetMinutes: number;
  hasOffset: boolean;
}

export interface LogEvent {
  /** Client address as written in the log; not validated. */
  address: string;
  timestamp: LogTimestamp | null;
  method: string;
  /** Raw request target as it appeared on the wire, not decoded. */
  requestTarget: string;
  path: string;
  query: string;
  status: number;
  byteCount: number;
  userAgent: string;
  referer: string | null;
  detectedTool: ToolName | null;
  attackTags: AttackTag[];
}

export type ParseFailureReason = 'empty' | 'grammar';

export type ParseOutcome =
  | { ok: true; event: LogEvent }
  | { ok: false; reason: ParseFailureReason };
