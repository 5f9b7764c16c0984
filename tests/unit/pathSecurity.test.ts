import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { resolveDestination, sanitizeFilename, sanitizePath } from '../../src/main/utils/pathSecurity';

describe('sanitizeFilename', () => {
  it.each([
    ['report.pdf', 'report.pdf'],
    ['../../etc/passwd', 'passwd'],
    ['..\\..\\windows\\system.ini', 'system.ini'],
    ['C:\\Users\\someone\\notes.txt', 'notes.txt'],
    ['my report (final).pdf', 'myreportfinal.pdf'],
    ['semi;colon|pipe.txt', 'semicolonpipe.txt'],
    ['archive-2024_v1.tar.gz', 'archive-2024_v1.tar.gz'],
    ['.hidden', '.hidden'],
  ])('turns %p into %p', (input, expected) => {
    expect(sanitizeFilename(input)).toBe(expected);
  });

  it.each(['', '..', '...', '/', '???', '★☆♪'])(
    'falls back to the placeholder for %p',
    (input) => {
      expect(sanitizeFilename(input)).toBe('unnamed_file');
    }
  );

  it('keeps letters and digits from any script', () => {
    expect(sanitizeFilename('résumé.pdf')).toBe('résumé.pdf');
    expect(sanitizeFilename('отчёт 2024.txt')).toBe('отчёт2024.txt');
    expect(sanitizeFilename('データ①.csv')).toBe('データ①.csv');
  });

  it('keeps distinct non-Latin names distinct', () => {
    expect(sanitizeFilename('日本.txt')).not.toBe(sanitizeFilename('中国.txt'));
  });

  it('counts the length limit in characters, not UTF-16 units', () => {
    const result = sanitizeFilename(`${'𝒳'.repeat(300)}.md`);

    expect(Array.from(result)).toHaveLength(255);
    expect(result).toBe(`${'𝒳'.repeat(252)}.md`);
  });

  it('truncates long names and keeps the extension', () => {
    const result = sanitizeFilename(`${'a'.repeat(300)}.txt`);

    expect(result).toBe(`${'a'.repeat(251)}.txt`);
    expect(result.length).toBe(255);
  });

  it('truncates long names without an extension', () => {
    expect(sanitizeFilename('b'.repeat(400))).toBe('b'.repeat(255));
  });

  it('is idempotent and only emits allowed characters', () => {
    const inputs = [
      '../../etc/passwd',
      'my report (final).pdf',
      '',
      '..',
      `${'x'.repeat(300)}.data`,
      'tab\tand\nnewline.txt',
      'nul\u0000byte.bin',
      'résumé (copy).pdf',
      `${'ü'.repeat(300)}.txt`,
    ];

    for (const input of inputs) {
      const once = sanitizeFilename(input);
      expect(once).toMatch(/^[\p{L}\p{N}._-]+$/u);
      expect(Array.from(once).length).toBeLessThanOrEqual(255);
      expect(once).not.toMatch(/^\.+$/);
      expect(sanitizeFilename(once)).toBe(once);
    }
  });
});

describe('sanitizePath', () => {
  const baseDir = path.join(os.tmpdir(), 'filerelay-base');

  it('resolves names inside the base directory', () => {
    expect(sanitizePath('file.txt', baseDir)).toBe(path.join(baseDir, 'file.txt'));
  });

  it('rejects paths that leave the base directory', () => {
    expect(() => sanitizePath('../outside.txt', baseDir)).toThrow('Path traversal detected');
    expect(() => sanitizePath('.', baseDir)).toThrow('Path traversal detected');
  });
});

describe('resolveDestination', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'filerelay-dest-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('uses the name as-is when it is free', async () => {
    await expect(resolveDestination(tempDir, 'a.txt')).resolves.toBe(path.join(tempDir, 'a.txt'));
  });

  it('appends a counter before the extension on collision', async () => {
    await fs.writeFile(path.join(tempDir, 'a.txt'), 'first');
    await expect(resolveDestination(tempDir, 'a.txt')).resolves.toBe(path.join(tempDir, 'a_1.txt'));

    await fs.writeFile(path.join(tempDir, 'a_1.txt'), 'second');
    await expect(resolveDestination(tempDir, 'a.txt')).resolves.toBe(path.join(tempDir, 'a_2.txt'));
  });

  it('appends the counter to names without an extension', async () => {
    await fs.writeFile(path.join(tempDir, 'README'), 'docs');

    await expect(resolveDestination(tempDir, 'README')).resolves.toBe(path.join(tempDir, 'README_1'));
  });

  it('only treats the last suffix as the extension', async () => {
    await fs.writeFile(path.join(tempDir, 'backup.tar.gz'), 'data');

    await expect(resolveDestination(tempDir, 'backup.tar.gz')).resolves.toBe(
      path.join(tempDir, 'backup.tar_1.gz')
    );
  });
});
