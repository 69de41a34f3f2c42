import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  sha256File,
  checksumsFileName,
  formatChecksums,
  parseChecksums,
  writeChecksumsFile,
  verifyChecksumsFile,
} from './checksum';

// sha256("hello\n") and sha256("")
const HELLO_SHA = '5891b5b522d5df086d0ff0b110fbd9d21bb4fc7163af34d08286a2e846f6be03';
const EMPTY_SHA = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('checksum', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relpack-checksum-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('sha256File should hash file contents', async () => {
    const file = path.join(tempDir, 'hello.txt');
    fs.writeFileSync(file, 'hello\n');

    expect(await sha256File(file)).toBe(HELLO_SHA);
  });

  it('checksumsFileName should follow the product_version pattern', () => {
    expect(checksumsFileName('tool', '1.2.3')).toBe('tool_1.2.3_checksums.txt');
  });

  it('formatChecksums should sort lines by file name', () => {
    expect(formatChecksums([
      { fileName: 'tool_1.2.3_linux-amd64.tar.gz', sha256: HELLO_SHA },
      { fileName: 'tool_1.2.3_darwin-amd64.tar.gz', sha256: EMPTY_SHA },
    ])).toBe(
      `${EMPTY_SHA}  tool_1.2.3_darwin-amd64.tar.gz\n${HELLO_SHA}  tool_1.2.3_linux-amd64.tar.gz\n`
    );
  });

  it('parseChecksums should ignore blank and malformed lines', () => {
    const content = `${HELLO_SHA}  a.zip\n\nnot a checksum line\n${EMPTY_SHA} *b.tar.gz\n`;

    expect(parseChecksums(content)).toEqual([
      { sha256: HELLO_SHA, fileName: 'a.zip' },
      { sha256: EMPTY_SHA, fileName: 'b.tar.gz' },
    ]);
  });

  it('writeChecksumsFile should hash each file by base name', async () => {
    const a = path.join(tempDir, 'b.zip');
    const b = path.join(tempDir, 'a.tar.gz');
    fs.writeFileSync(a, 'hello\n');
    fs.writeFileSync(b, '');
    const output = path.join(tempDir, 'tool_1.2.3_checksums.txt');

    await writeChecksumsFile(output, [a, b]);

    expect(fs.readFileSync(output, 'utf8')).toBe(`${EMPTY_SHA}  a.tar.gz\n${HELLO_SHA}  b.zip\n`);
  });

  it('verifyChecksumsFile should report changed and missing files', async () => {
    const kept = path.join(tempDir, 'kept.zip');
    const changed = path.join(tempDir, 'changed.zip');
    const removed = path.join(tempDir, 'removed.zip');
    fs.writeFileSync(kept, 'hello\n');
    fs.writeFileSync(changed, 'hello\n');
    fs.writeFileSync(removed, 'hello\n');
    const output = path.join(tempDir, 'sums.txt');
    await writeChecksumsFile(output, [kept, changed, removed]);

    fs.writeFileSync(changed, '');
    fs.rmSync(removed);

    expect(await verifyChecksumsFile(output)).toEqual([
      { fileName: 'changed.zip', expected: HELLO_SHA, actual: EMPTY_SHA },
      { fileName: 'removed.zip', expected: HELLO_SHA, actual: null },
    ]);
  });
});
