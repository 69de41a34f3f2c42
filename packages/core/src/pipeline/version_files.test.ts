import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyVersionRule, updateVersionFiles } from './version_files';
import { DEFAULT_VERSION_FILES } from '../config_manager';
import type { VersionFileRule } from '../config_manager';

const SCRIPT_RULE: VersionFileRule = {
  path: 'build-with-version.sh',
  pattern: '^VERSION=\\$\\{1:-v[0-9]+\\.[0-9]+\\.[0-9]+\\}',
  replacement: 'VERSION=${1:-{version}}',
};

describe('applyVersionRule', () => {
  it('should substitute the tag into the replacement', () => {
    expect(applyVersionRule('VERSION=${1:-v0.9.0}\n', SCRIPT_RULE, 'v1.2.3')).toBe('VERSION=${1:-v1.2.3}\n');
  });

  it('should anchor the pattern at line starts', () => {
    const content = '#!/bin/bash\nVERSION=${1:-v1.0.0}\necho "$VERSION"\n';
    expect(applyVersionRule(content, SCRIPT_RULE, 'v2.0.0'))
      .toBe('#!/bin/bash\nVERSION=${1:-v2.0.0}\necho "$VERSION"\n');
  });

  it('should return null when the pattern does not match', () => {
    expect(applyVersionRule('export VERSION=${1:-v1.0.0}\n', SCRIPT_RULE, 'v2.0.0')).toBeNull();
  });

  it('should keep $ sequences in the replacement literal', () => {
    const rule: VersionFileRule = { path: 'x', pattern: '^v=.*$', replacement: 'v="$1-{version}"' };
    expect(applyVersionRule('v=old', rule, 'v2.0.0')).toBe('v="$1-v2.0.0"');
  });

  it('should replace every matching line', () => {
    const rule: VersionFileRule = { path: 'x', pattern: '^version: .*$', replacement: 'version: {version}' };
    expect(applyVersionRule('version: a\nname: b\nversion: c', rule, 'v3.0.0'))
      .toBe('version: v3.0.0\nname: b\nversion: v3.0.0');
  });
});

describe('updateVersionFiles', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'relpack-version-files-'));
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  it('should rewrite a matching file and keep its mode', async () => {
    const script = path.join(projectRoot, 'build-with-version.sh');
    fs.writeFileSync(script, '#!/bin/bash\nVERSION=${1:-v0.1.0}\n', { mode: 0o755 });
    fs.chmodSync(script, 0o755);

    const updates = await updateVersionFiles(projectRoot, DEFAULT_VERSION_FILES, 'v1.2.3');

    expect(updates).toEqual([{ path: 'build-with-version.sh', status: 'updated' }]);
    expect(fs.readFileSync(script, 'utf8')).toBe('#!/bin/bash\nVERSION=${1:-v1.2.3}\n');
    expect(fs.statSync(script).mode & 0o777).toBe(0o755);
  });

  it('should report missing files without failing', async () => {
    const updates = await updateVersionFiles(projectRoot, [SCRIPT_RULE], 'v1.2.3');

    expect(updates).toEqual([{ path: 'build-with-version.sh', status: 'missing' }]);
  });

  it('should report files already at the version as unchanged', async () => {
    fs.writeFileSync(path.join(projectRoot, 'build-with-version.sh'), 'VERSION=${1:-v1.2.3}\n');

    const updates = await updateVersionFiles(projectRoot, [SCRIPT_RULE], 'v1.2.3');

    expect(updates).toEqual([{ path: 'build-with-version.sh', status: 'unchanged' }]);
  });

  it('should report files the pattern does not match', async () => {
    fs.writeFileSync(path.join(projectRoot, 'build-with-version.sh'), 'echo hello\n');

    const updates = await updateVersionFiles(projectRoot, [SCRIPT_RULE], 'v1.2.3');

    expect(updates).toEqual([{ path: 'build-with-version.sh', status: 'no-match' }]);
    expect(fs.readFileSync(path.join(projectRoot, 'build-with-version.sh'), 'utf8')).toBe('echo hello\n');
  });
});
