import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { writeFileAtomic } from './atomic-write.js';
import { OutputExistsError } from './errors.js';

describe('writeFileAtomic', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pathguard-atomic-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write the file and leave no temp file behind', async () => {
    const target = path.join(tmpDir, 'out.enc');

    await writeFileAtomic(target, Buffer.from('payload'), { overwrite: false });

    expect(fs.readFileSync(target, 'utf8')).toBe('payload');
    expect(fs.readdirSync(tmpDir)).toEqual(['out.enc']);
  });

  it('should create files readable only by the owner by default', async () => {
    const target = path.join(tmpDir, 'out.enc');

    await writeFileAtomic(target, Buffer.from('payload'), { overwrite: false });

    expect(fs.statSync(target).mode & 0o777).toBe(0o600);
  });

  it('should refuse to replace an existing file without overwrite', async () => {
    const target = path.join(tmpDir, 'out.enc');
    fs.writeFileSync(target, 'original');

    await expect(
      writeFileAtomic(target, Buffer.from('payload'), { overwrite: false }),
    ).rejects.toThrow(OutputExistsError);

    expect(fs.readFileSync(target, 'utf8')).toBe('original');
    expect(fs.readdirSync(tmpDir)).toEqual(['out.enc']);
  });

  it('should replace an existing file with overwrite', async () => {
    const target = path.join(tmpDir, 'out.enc');
    fs.writeFileSync(target, 'original');

    await writeFileAtomic(target, Buffer.from('payload'), { overwrite: true });

    expect(fs.readFileSync(target, 'utf8')).toBe('payload');
  });

  it('should discard the write when the signal is aborted', async () => {
    const target = path.join(tmpDir, 'out.enc');
    const controller = new AbortController();
    controller.abort();

    await expect(
      writeFileAtomic(target, Buffer.from('payload'), { overwrite: false, signal: controller.signal }),
    ).rejects.toThrow();

    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});
