import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { convertLineEndings, normalizeLineEndings } from './line-endings.js';

describe('line-endings', () => {
  describe('normalizeLineEndings', () => {
    it('should convert CRLF to LF', () => {
      expect(normalizeLineEndings('a\r\nb\r\n', 'lf')).toBe('a\nb\n');
    });

    it('should convert LF to CRLF without doubling existing CRLF', () => {
      expect(normalizeLineEndings('a\nb\r\nc', 'crlf')).toBe('a\r\nb\r\nc');
    });
  });

  describe('convertLineEndings', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pathguard-eol-test-'));
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it('should rewrite files in place', async () => {
      const file = path.join(tmpDir, 'script.sh');
      fs.writeFileSync(file, 'echo one\r\necho two\r\n');

      const results = await convertLineEndings([file], { to: 'lf' });

      expect(results).toEqual([{ path: file, status: 'converted', message: null }]);
      expect(fs.readFileSync(file, 'utf8')).toBe('echo one\necho two\n');
      expect(fs.readdirSync(tmpDir)).toEqual(['script.sh']);
    });

    it('should report files that already match', async () => {
      const file = path.join(tmpDir, 'notes.txt');
      fs.writeFileSync(file, 'one\ntwo\n');

      const results = await convertLineEndings([file], { to: 'lf' });

      expect(results[0]?.status).toBe('unchanged');
    });

    it('should skip binary files', async () => {
      const file = path.join(tmpDir, 'blob.bin');
      fs.writeFileSync(file, Buffer.from([0x41, 0x0a, 0x00, 0x42]));

      const results = await convertLineEndings([file], { to: 'crlf' });

      expect(results).toEqual([{ path: file, status: 'skipped', message: 'Binary file' }]);
      expect(fs.readFileSync(file).equals(Buffer.from([0x41, 0x0a, 0x00, 0x42]))).toBe(true);
    });

    it('should keep non-UTF-8 bytes intact', async () => {
      const file = path.join(tmpDir, 'latin.txt');
      fs.writeFileSync(file, Buffer.from([0xe9, 0x0a, 0xff, 0x0a]));

      await convertLineEndings([file], { to: 'crlf' });

      expect(fs.readFileSync(file).equals(Buffer.from([0xe9, 0x0d, 0x0a, 0xff, 0x0d, 0x0a]))).toBe(true);
    });

    it('should not modify anything in a dry run', async () => {
      const file = path.join(tmpDir, 'notes.txt');
      fs.writeFileSync(file, 'one\ntwo\n');

      const results = await convertLineEndings([file], { to: 'crlf', dryRun: true });

      expect(results[0]?.status).toBe('dry-run');
      expect(fs.readFileSync(file, 'utf8')).toBe('one\ntwo\n');
    });

    it('should walk directories recursively', async () => {
      fs.mkdirSync(path.join(tmpDir, 'src', 'lib'), { recursive: true });
      fs.writeFileSync(path.join(tmpDir, 'src', 'a.txt'), 'a\r\n');
      fs.writeFileSync(path.join(tmpDir, 'src', 'lib', 'b.txt'), 'b\r\n');

      const results = await convertLineEndings([path.join(tmpDir, 'src')], { to: 'lf', recurse: true });

      expect(results.map((r) => r.status)).toEqual(['converted', 'converted']);
      expect(fs.readFileSync(path.join(tmpDir, 'src', 'lib', 'b.txt'), 'utf8')).toBe('b\n');
    });

    it('should report missing paths and continue', async () => {
      const file = path.join(tmpDir, 'notes.txt');
      fs.writeFileSync(file, 'one\r\n');
      const missing = path.join(tmpDir, 'missing.txt');

      const results = await convertLineEndings([missing, file], { to: 'lf' });

      expect(results).toEqual([
        { path: missing, status: 'failed', message: `Path not found: ${missing}` },
        { path: file, status: 'converted', message: null },
      ]);
    });
  });
});
