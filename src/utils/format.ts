import type { BulkActionReport } from '../protocol';
import type { StreamSummary } from '../query/predicate';
import type { ConfirmationSummary } from '../query/controller';

export function formatAge(ms: number): string {
  if (ms < 1000) return `${Math.max(0, Math.floor(ms))}ms`;
  if (ms < 60_000) return `${Math.floor(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.floor(ms / 60_000)}m`;
  return `${Math.floor(ms / 3_600_000)}h`;
}

/** 1234 -> "1.2K", 2500000 -> "2.5M". */
export function formatCount(n: bigint | number): string {
  const v = Number(n);
  if (v > 1_000_000) return `${(v / 1_000_000).toFixed(1)}M`;
  if (v > 1000) return `${(v / 1000).toFixed(1)}K`;
  return String(n);
}

export function formatBytes(b: bigint | number): string {
  const v = Number(b);
  if (v > 1024 ** 3) return `${(v / 1024 ** 3).toFixed(1)}GB`;
  if (v > 1024 ** 2) return `${(v / 1024 ** 2).toFixed(1)}MB`;
  if (v > 1024) return `${(v / 1024).toFixed(1)}KB`;
  return `${b}B`;
}

export function formatConfirmation(summary: ConfirmationSummary): string {
  const lines = summary.sample.map(name => `  - ${name}`);
  if (summary.remaining > 0) lines.push(`  ... and ${summary.remaining} more`);

  const head = summary.action === 'delete'
    ? `Delete ${summary.total} streams?`
    : `Purge all messages from ${summary.total} streams?`;
  const tail = summary.action === 'delete'
    ? 'This action cannot be undone!'
    : 'Consumers will remain, only messages deleted.';

  return `${head}\n\n${lines.join('\n')}\n\n${tail}`;
}

export function formatReport(report: BulkActionReport): string {
  const verb = report.action === 'delete' ? 'Deleted' : 'Purged';
  const title = report.action === 'delete' ? 'Bulk Delete Complete' : 'Bulk Purge Complete';
  const lines = [
    title,
    '',
    `${verb}: ${report.succeeded} streams`,
    `Failed: ${report.failed} streams`,
  ];
  for (const f of report.failures) {
    lines.push(`  ! ${f.name}: ${f.reason}`);
  }
  return lines.join('\n');
}

/** Fixed-width table: name, age, messages, size, consumers. */
export function formatStreamTable(streams: readonly StreamSummary[], now: Date): string {
  const rows = streams.map(s => [
    s.name,
    formatAge(now.getTime() - s.firstTime.getTime()),
    formatCount(s.messages),
    formatBytes(s.bytes),
    String(s.consumers),
  ]);
  const header = ['NAME', 'AGE', 'MESSAGES', 'SIZE', 'CONSUMERS'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => r[i].length)));

  return [header, ...rows]
    .map(cells => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd())
    .join('\n');
}

export function formatStreamDetail(stream: StreamSummary, now: Date): string {
  const age = formatAge(now.getTime() - stream.firstTime.getTime());
  const rows: [string, string][] = [
    ['Name', stream.name],
    ['Subjects', stream.subjects.length > 0 ? stream.subjects.join(', ') : '(none)'],
    ['First msg', `${stream.firstTime.toISOString()} (${age} ago)`],
    ['Messages', stream.messages.toString()],
    ['Size', formatBytes(stream.bytes)],
    ['Consumers', String(stream.consumers)],
  ];
  return rows.map(([label, value]) => `${`${label}:`.padEnd(11)} ${value}`).join('\n');
}
