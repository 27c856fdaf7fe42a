/**
 * Standalone HTML report generator.
 *
 * Produces a single self-contained page with inline CSS. Every value taken
 * from the logs is HTML-escaped before interpolation.
 */

import { formatLogTimestamp } from '../ingestion/timestamp.js';
import type { AddressProfile, AnalysisResult } from '../types/analysis.js';
import { formatStatusCodes } from './markdown-reporter.js';
import { writeReportFile } from './write-report.js';

const HIGH_SCORE = 5;
const MEDIUM_SCORE = 2;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function generateHtmlReport(result: AnalysisResult, generatedAt: Date = new Date()): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Web Log Threat Hunt Report</title>
  <style>
    :root {
      --bg-primary: #f5f5f5;
      --bg-card: #ffffff;
      --bg-muted: #ecf0f1;
      --text-primary: #2c3e50;
      --text-muted: #7f8c8d;
      --accent-blue: #3498db;
      --accent-red: #e74c3c;
      --accent-orange: #f39c12;
      --accent-green: #27ae60;
    }
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: var(--bg-primary);
      color: var(--text-primary);
      line-height: 1.6;
      padding: 2rem;
    }
    .container { max-width: 1200px; margin: 0 auto; background: var(--bg-card); padding: 2rem; border-radius: 8px; }
    h1 { font-size: 2rem; border-bottom: 3px solid var(--accent-blue); padding-bottom: 0.5rem; margin-bottom: 1rem; }
    h2 { font-size: 1.4rem; margin: 2rem 0 1rem; border-bottom: 2px solid var(--bg-muted); padding-bottom: 0.4rem; }
    h3 { font-size: 1.1rem; color: var(--text-muted); margin: 1.5rem 0 0.75rem; }
    .meta { color: var(--text-muted); font-size: 0.9rem; margin-bottom: 1.5rem; }
    .stats-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(180px, 1fr)); gap: 1rem; margin: 1rem 0; }
    .stat-card { background: var(--bg-muted); padding: 1rem; border-radius: 6px; text-align: center; }
    .stat-value { font-size: 1.8rem; font-weight: bold; }
    .stat-label { font-size: 0.85rem; color: var(--text-muted); }
    table { width: 100%; border-collapse: collapse; margin: 1rem 0; }
    th, td { padding: 0.6rem; text-align: left; border-bottom: 1px solid var(--bg-muted); vertical-align: top; }
    th { background: var(--text-primary); color: white; font-weight: 600; }
    .num { text-align: right; }
    .high-score { color: var(--accent-red); font-weight: bold; }
    .medium-score { color: var(--accent-orange); font-weight: bold; }
    .low-score { color: var(--accent-green); }
    .badge { display: inline-block; padding: 0.15rem 0.5rem; margin: 0.1rem; border-radius: 3px; font-size: 0.8rem; color: white; }
    .tool-badge { background: var(--accent-blue); }
    .attack-badge { background: var(--accent-red); }
    .empty { color: var(--text-muted); font-style: italic; }
    ul { margin-left: 1.5rem; }
    code { background: var(--bg-muted); padding: 0.1rem 0.35rem; border-radius: 3px; font-family: monospace; word-break: break-all; }
    .footer { margin-top: 3rem; padding-top: 1rem; border-top: 1px solid var(--bg-muted); color: var(--text-muted); font-size: 0.85rem; text-align: center; }
  </style>
</head>
<body>
  <div class="container">
    <h1>Web Log Threat Hunt Report</h1>
    <div class="meta"><strong>Generated:</strong> ${escapeHtml(generatedAt.toISOString())}</div>
${renderSummaryCards(result)}
${renderTopAddresses(result)}
${renderToolTimeline(result)}
${renderVulnerableEndpoints(result)}
${renderScrapeSection(result)}
${renderAddressDetails(result)}
    <div class="footer">Generated by tracehound</div>
  </div>
</body>
</html>
`;
}

export function writeHtmlReport(result: AnalysisResult, outputPath: string): void {
  writeReportFile(outputPath, generateHtmlReport(result));
}

/**
 * CSS class for a composite address score.
 */
export function scoreClass(score: number): 'high-score' | 'medium-score' | 'low-score' {
  if (score >= HIGH_SCORE) return 'high-score';
  if (score >= MEDIUM_SCORE) return 'medium-score';
  return 'low-score';
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

// ---------------------------------------------------------------------------
// Section Renderers
// ---------------------------------------------------------------------------

function renderSummaryCards(result: AnalysisResult): string {
  const cards: [string, number][] = [
    ['Files read', result.filesRead],
    ['Parsed events', result.parsedEvents],
    ['Parse failures', result.parseFailures],
    ['Ranked IPs', result.topAddresses.length],
    ['SQLi endpoints', result.vulnerableEndpoints.length],
  ];

  const body = cards
    .map(
      ([label, value]) =>
        `      <div class="stat-card"><div class="stat-value">${value.toLocaleString('en-US')}</div><div class="stat-label">${label}</div></div>`,
    )
    .join('\n');

  return `    <div class="stats-grid">\n${body}\n    </div>`;
}

function renderTopAddresses(result: AnalysisResult): string {
  let html = '    <h2>Top suspicious IPs</h2>\n';

  if (result.topAddresses.length === 0) {
    return html + '    <p class="empty">No IPs found matching the minimum request threshold.</p>';
  }

  html += '    <table>\n      <thead><tr><th>Rank</th><th>IP</th><th class="num">Score</th><th class="num">Requests</th><th>Tools</th></tr></thead>\n      <tbody>\n';
  result.topAddresses.forEach((profile, i) => {
    html += `        <tr><td>${i + 1}</td><td>${escapeHtml(profile.address)}</td>`;
    html += `<td class="num ${scoreClass(profile.score)}">${profile.score.toFixed(2)}</td>`;
    html += `<td class="num">${profile.requestCount}</td><td>${toolBadges(profile)}</td></tr>\n`;
  });
  html += '      </tbody>\n    </table>';

  return html;
}

function renderToolTimeline(result: AnalysisResult): string {
  let html = '    <h2>Attacker tools (by first appearance)</h2>\n';

  if (result.toolsFirstSeen.length === 0) {
    return html + '    <p class="empty">No tool fingerprints found in User-Agent fields.</p>';
  }

  html += '    <ul>\n';
  for (const { tool, firstSeen } of result.toolsFirstSeen) {
    html += `      <li><span class="badge tool-badge">${escapeHtml(tool)}</span> first seen ${escapeHtml(formatLogTimestamp(firstSeen))}</li>\n`;
  }
  html += '    </ul>';

  return html;
}

function renderVulnerableEndpoints(result: AnalysisResult): string {
  let html = '    <h2>Likely vulnerable SQLi endpoints</h2>\n';

  if (result.vulnerableEndpoints.length === 0) {
    return html + '    <p class="empty">No SQLi signatures found.</p>';
  }

  html += '    <table>\n      <thead><tr><th>Rank</th><th>Endpoint</th><th class="num">Score</th><th class="num">SQLi hits</th><th class="num">SQLi+5xx</th><th class="num">Unique payloads</th><th>Examples</th></tr></thead>\n      <tbody>\n';
  result.vulnerableEndpoints.slice(0, 10).forEach((ep, i) => {
    const examples = ep.examples.map((url) => `<code>${escapeHtml(url)}</code>`).join('<br>');
    html += `        <tr><td>${i + 1}</td><td><code>${escapeHtml(ep.endpoint)}</code></td>`;
    html += `<td class="num">${ep.score}</td><td class="num">${ep.sqliHits}</td><td class="num">${ep.sqliWith5xx}</td>`;
    html += `<td class="num">${ep.uniquePayloads}</td><td>${examples}</td></tr>\n`;
  });
  html += '      </tbody>\n    </table>';

  return html;
}

function renderScrapeSection(result: AnalysisResult): string {
  const html = '    <h2>Inferred section used for data scraping</h2>\n';

  if (!result.inferredScrapeSection) {
    return html + '    <p class="empty">Could not infer a scraping section.</p>';
  }

  return (
    html +
    `    <p>Most likely section: <code>${escapeHtml(result.inferredScrapeSection)}</code> ` +
    '(identity/user-related endpoint repeatedly hit by top suspicious IPs)</p>'
  );
}

function renderAddressDetails(result: AnalysisResult): string {
  if (result.topAddresses.length === 0) return '';

  let html = '    <h2>Per-IP movement</h2>\n';
  for (const profile of result.topAddresses) {
    html += `    <h3>${escapeHtml(profile.address)}</h3>\n    <ul>\n`;
    html += `      <li>Requests: <strong>${profile.requestCount}</strong>, score <span class="${scoreClass(profile.score)}">${profile.score.toFixed(2)}</span></li>\n`;
    html += `      <li>Status codes: ${escapeHtml(formatStatusCodes(profile.statusCodes))}</li>\n`;
    html += `      <li>Login probes: ${profile.loginAttempts}, identity queries: ${profile.identityQueries}, peak requests/minute: ${profile.maxRequestsPerMinute}</li>\n`;
    html += '      <li>Top endpoints:<ul>';
    for (const { path, count } of profile.topPaths) {
      html += `<li><code>${escapeHtml(path)}</code> (${count})</li>`;
    }
    html += '</ul></li>\n';

    if (profile.abnormalExamples.length > 0) {
      html += '      <li>Abnormal query examples:<ul>';
      for (const event of profile.abnormalExamples) {
        const badges = event.attackTags
          .map((tag) => `<span class="badge attack-badge">${escapeHtml(tag)}</span>`)
          .join('');
        html += `<li>${badges} <code>${escapeHtml(event.requestTarget)}</code> (status ${event.status})</li>`;
      }
      html += '</ul></li>\n';
    }
    html += '    </ul>\n';
  }

  return html;
}

function toolBadges(profile: AddressProfile): string {
  if (profile.toolsUsed.length === 0) return '-';
  return profile.toolsUsed
    .map((tool) => `<span class="badge tool-badge">${escapeHtml(tool)}</span>`)
    .join('');
}
