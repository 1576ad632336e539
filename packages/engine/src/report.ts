/**
 * Aggregate report building and rendering
 */

import type { AggregateReport, RunResult } from '@netsnap/core';

export const CHUNK_MAX = 4000;
const ERROR_TEXT_MAX = 300;
const RULE = '━━━━━━━━━━━━━━━━━━━━';

/**
 * Merge per-device results, in iteration order, into one report.
 */
export function buildReport(results: readonly RunResult[], startedAt: Date, finishedAt: Date): AggregateReport {
  const failed = results.filter(result => result.status === 'failed').length;
  const partiallySucceeded = results.filter(result => result.status === 'partially_succeeded').length;

  return {
    total: results.length,
    succeeded: results.length - failed,
    partiallySucceeded,
    failed,
    results: [...results],
    startedAt,
    finishedAt,
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `DD/MM/YYYY HH:MM:SS` in local time
 */
export function formatDateTime(date: Date): string {
  return (
    `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatKilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)} KB`;
}

function code(text: string): string {
  return `<code>${escapeHtml(text)}</code>`;
}

function headline(report: AggregateReport): string {
  if (report.failed === 0) return '✅ <b>BACKUP JOB - SUCCESS</b>';
  if (report.succeeded === 0) return '🔴 <b>BACKUP JOB - FAILED</b>';
  return '🔴 <b>BACKUP JOB - PARTIAL FAILURE</b>';
}

/**
 * Render the report as Telegram HTML. Same report, same text.
 */
export function renderReport(report: AggregateReport): string {
  const lines: string[] = [headline(report), RULE];

  lines.push('📊 <b>Run summary</b>');
  lines.push(`• Devices: ${code(String(report.total))}`);
  lines.push(`• Succeeded: ${code(String(report.succeeded))}`);
  if (report.partiallySucceeded > 0) {
    lines.push(`• Without history commit: ${code(String(report.partiallySucceeded))}`);
  }
  lines.push(`• Failed: ${code(String(report.failed))}`);
  lines.push(`• Total duration: ${code(formatSeconds(report.durationMs))}`);
  lines.push(`• Finished: ${code(formatDateTime(report.finishedAt))}`);
  lines.push('');

  const written = report.results.filter(result => result.status !== 'failed');
  if (written.length > 0) {
    lines.push('✅ <b>Backups written</b>', RULE);
    for (const result of written) {
      lines.push(`🖥 <b>${escapeHtml(result.hostname ?? result.address)}</b>`);
      if (result.snapshot) {
        lines.push(`  • File: ${code(result.snapshot.fileName)}`);
      }
      lines.push(`  • Size: ${code(formatKilobytes(result.sizeBytes))}`);
      lines.push(`  • Time: ${code(formatSeconds(result.durationMs))}`);
      for (const warning of result.warnings) {
        lines.push(`  • Warning: ${code(truncate(warning, ERROR_TEXT_MAX))}`);
      }
      lines.push('');
    }
  }

  const failures = report.results.filter(result => result.status === 'failed');
  if (failures.length > 0) {
    lines.push('❌ <b>Failures</b>', RULE);
    for (const result of failures) {
      const reason = result.failure
        ? `${result.failure.name}: ${result.failure.message}`
        : 'unknown error';
      lines.push(`🖥 IP: ${code(result.address)}`);
      lines.push(`  • Error: ${code(truncate(reason, ERROR_TEXT_MAX))}`);
      lines.push('');
    }
  }

  return lines.join('\n').trimEnd();
}

/**
 * Split a message into chunks of at most {@link CHUNK_MAX} characters,
 * preferring line boundaries.
 */
export function chunkMessage(text: string, max: number = CHUNK_MAX): string[] {
  if (text.length <= max) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= max) {
      chunks.push(remaining);
      break;
    }

    let splitAt = remaining.lastIndexOf('\n', max);
    if (splitAt < max * 0.5) {
      splitAt = remaining.lastIndexOf(' ', max);
    }
    if (splitAt < max * 0.3) {
      splitAt = max;
    }

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trimStart();
  }

  return chunks;
}
