/**
 * First appearance of each client tool in the logs.
 */

import type { ToolSighting } from '../types/analysis.js';
import type { LogEvent, LogTimestamp, ToolName } from '../types/log-event.js';

/**
 * Earliest timestamp per detected tool, sorted oldest first. Events
 * without a tool or without a timestamp are ignored.
 */
export function findToolsFirstSeen(events: readonly LogEvent[]): ToolSighting[] {
  const firstSeen = new Map<ToolName, LogTimestamp>();

  for (const event of events) {
    if (!event.detectedTool || !event.timestamp) continue;

    const current = firstSeen.get(event.detectedTool);
    if (!current || event.timestamp.epochMs < current.epochMs) {
      firstSeen.set(event.detectedTool, event.timestamp);
    }
  }

  return [...firstSeen]
    .map(([tool, ts]) => ({ tool, firstSeen: ts }))
    .sort((a, b) => a.firstSeen.epochMs - b.firstSeen.epochMs);
}
