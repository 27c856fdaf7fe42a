/**
 * Combined-format access log line parser.
 *
 * Example line:
 *   203.0.113.7 - - [10/Apr/2021:12:01:55 +0000] "GET /search?q=1 HTTP/1.1" 200 1234 "-" "curl/8.0"
 *
 * Every parsed line is annotated with the signature catalog's attack tags
 * (from the raw request target) and client tool (from the User-Agent).
 */

import { detectAttacks } from '../detection/attack-signatures.js';
import { detectTool } from '../detection/tool-signatures.js';
import type { LogEvent, ParseOutcome } from '../types/log-event.js';
import { splitRequestTarget } from '../utils/url.js';
import { parseLogTimestamp } from './timestamp.js';

export const COMBINED_LOG_PATTERN =
  /^(?<address>\S+)\s+\S+\s+\S+\s+\[(?<timestamp>[^\]]+)\]\s+"(?<method>[A-Z]+)\s+(?<target>\S+)(?:\s+HTTP\/(?<httpVersion>[^"]+))?"\s+(?<status>\d{3})\s+(?<bytes>\S+)(?:\s+"(?<referer>[^"]*)"\s+"(?<userAgent>[^"]*)")?/;

const DIGITS = /^\d+$/;

/**
 * Parse one raw log line.
 *
 * A line that does not fit the combined grammar is a failure. An
 * unreadable timestamp or byte count is not: the event is still
 * produced, with a null timestamp or zero bytes.
 */
export function parseLine(rawLine: string): ParseOutcome {
  if (rawLine.length === 0) return { ok: false, reason: 'empty' };

  const groups = COMBINED_LOG_PATTERN.exec(rawLine)?.groups;
  if (!groups) return { ok: false, reason: 'grammar' };

  const requestTarget = groups.target;
  const { path, query } = splitRequestTarget(requestTarget);
  const userAgent = groups.userAgent ?? '';

  const event: LogEvent = {
    address: groups.address,
    timestamp: parseLogTimestamp(groups.timestamp),
    method: groups.method,
    requestTarget,
    path,
    query,
    status: Number(groups.status),
    byteCount: parseByteCount(groups.bytes),
    userAgent,
    referer: groups.referer ?? null,
    detectedTool: detectTool(userAgent),
    attackTags: detectAttacks(requestTarget),
  };

  return { ok: true, event };
}

/**
 * `-`, an empty token, or anything that is not a plain digit string
 * counts as zero bytes.
 */
export function parseByteCount(token: string): number {
  if (!DIGITS.test(token)) return 0;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : 0;
}
