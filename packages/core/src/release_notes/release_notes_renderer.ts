import type { ReleaseNoteRecord } from './release_notes.types';
import { CATEGORY_TITLES, CHANGE_CATEGORIES } from './release_notes.types';

/**
 * Markdown section for one version. Ends with a blank line.
 */
export function renderRecord(record: ReleaseNoteRecord): string {
  const lines: string[] = [];

  lines.push(`## ${record.version ?? 'Unknown'}`);
  lines.push('');
  lines.push(`**Release Date:** ${record.date ?? 'Unknown'}`);
  lines.push('');

  if (record.summary) {
    lines.push(record.summary);
    lines.push('');
  }

  if (record.highlights?.length) {
    lines.push('### Highlights');
    lines.push('');
    for (const highlight of record.highlights) {
      lines.push(`- ${highlight}`);
    }
    lines.push('');
  }

  // breaking and security first
  for (const category of CHANGE_CATEGORIES) {
    const items = record.changes?.[category];
    if (!items?.length) continue;
    lines.push(`### ${CATEGORY_TITLES[category]}`);
    lines.push('');
    for (const item of items) {
      lines.push(item.issue ? `- ${item.description} (${item.issue})` : `- ${item.description}`);
    }
    lines.push('');
  }

  if (record.components?.length) {
    lines.push('### Affected Components');
    lines.push('');
    lines.push(record.components.join(', '));
    lines.push('');
  }

  if (record.notes) {
    lines.push('### Notes');
    lines.push('');
    lines.push(record.notes);
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Full document: header, then each section followed by a `---` rule.
 */
export function renderDocument(product: string, generatedAt: Date, sections: string[]): string {
  const lines: string[] = [
    `# ${product} Release Notes`,
    '',
    `Generated: ${formatTimestamp(generatedAt)}`,
    '',
    '---',
    '',
  ];

  if (sections.length === 0) {
    lines.push('No release notes available.');
    lines.push('');
    return lines.join('\n');
  }

  for (const section of sections) {
    lines.push(section);
    lines.push('---');
    lines.push('');
  }
  return lines.join('\n');
}
