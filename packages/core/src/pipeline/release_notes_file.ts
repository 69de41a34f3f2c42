import type { ReleaseNoteRecord } from '../release_notes/release_notes.types';
import type { Version } from '../version';
import { renderRecord } from '../release_notes/release_notes_renderer';

export type BuildInfo = {
  builtAt: Date;
  /** Short commit hash, or "unknown" */
  commit: string;
};

export type ReleaseNotesFileInput = {
  product: string;
  version: Version;
  /** The version's record, or null for the generic body */
  record: ReleaseNoteRecord | null;
  /** `name (size)` lines for every published file */
  artifacts: string[];
  checksumsFileName?: string;
  buildInfo: BuildInfo;
};

export function releaseNotesFileName(version: Version): string {
  return `RELEASE_NOTES_${version.tag}.md`;
}

/**
 * `YYYY-MM-DD HH:MM:SS UTC`
 */
export function formatBuildDate(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * Markdown published next to the release archives.
 */
export function renderReleaseNotesFile(input: ReleaseNotesFileInput): string {
  const { product, version, record, buildInfo } = input;
  const lines: string[] = [`# ${product} ${version.tag}`, ''];

  if (record) {
    lines.push(renderRecord(record));
  } else {
    lines.push(`Release ${version.tag} of ${product}.`, '');
  }

  lines.push('## Artifacts', '');
  if (input.artifacts.length === 0) {
    lines.push('No artifacts.');
  } else {
    input.artifacts.forEach(artifact => lines.push(`- ${artifact}`));
  }
  lines.push('');

  if (input.checksumsFileName) {
    lines.push('## Verification', '');
    lines.push(`Verify downloads using the SHA-256 checksums in \`${input.checksumsFileName}\`.`, '');
  }

  lines.push('---', '');
  lines.push('**Build Information:**');
  lines.push(`- Build Date: ${formatBuildDate(buildInfo.builtAt)}`);
  lines.push(`- Git Commit: ${buildInfo.commit}`);
  lines.push('');

  return lines.join('\n');
}
