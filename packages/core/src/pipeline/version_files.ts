import * as path from 'path';
import { promises as fs } from 'fs';
import type { VersionFileRule } from '../config_manager/config_manager.types';
import { isErrnoException, writeFileAtomic } from '../utils/fs_helpers';

export type VersionFileUpdate =
  | { path: string; status: 'updated' }
  | { path: string; status: 'unchanged' }
  | { path: string; status: 'missing' }
  | { path: string; status: 'no-match' };

/**
 * Applies one rule to file content. `pattern` is compiled multiline, so `^`
 * and `$` anchor at line boundaries; every match is replaced.
 *
 * @returns the new content, or null when the pattern does not match
 */
export function applyVersionRule(content: string, rule: VersionFileRule, tag: string): string | null {
  const pattern = new RegExp(rule.pattern, 'gm');
  if (!pattern.test(content)) return null;
  pattern.lastIndex = 0;
  const replacement = rule.replacement.split('{version}').join(tag);
  // Replacer function: `$` in the replacement stays literal
  return content.replace(pattern, () => replacement);
}

/**
 * Rewrites every configured version file under `projectRoot`. Files that do
 * not exist are reported as `missing` and left alone.
 */
export async function updateVersionFiles(
  projectRoot: string,
  rules: VersionFileRule[],
  tag: string
): Promise<VersionFileUpdate[]> {
  const updates: VersionFileUpdate[] = [];

  for (const rule of rules) {
    const filePath = path.resolve(projectRoot, rule.path);
    let content: string;
    let mode: number;
    try {
      mode = (await fs.stat(filePath)).mode & 0o7777;
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        updates.push({ path: rule.path, status: 'missing' });
        continue;
      }
      throw error;
    }

    const updated = applyVersionRule(content, rule, tag);
    if (updated === null) {
      updates.push({ path: rule.path, status: 'no-match' });
    } else if (updated === content) {
      updates.push({ path: rule.path, status: 'unchanged' });
    } else {
      await writeFileAtomic(filePath, updated);
      await fs.chmod(filePath, mode);
      updates.push({ path: rule.path, status: 'updated' });
    }
  }

  return updates;
}
