/**
 * Tests for LocalFileRenamer on a temporary folder
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LocalFileRenamer } from '../src/modules/files/LocalFileRenamer';

jest.mock('../src/utils/logger', () => ({
  AppLogger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  }
}));

describe('LocalFileRenamer', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'renamer-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('should rename the file within its folder', async () => {
    const source = writeFile('scan001.pdf', 'invoice');
    const renamer = new LocalFileRenamer();

    const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

    const destination = path.join(tmpDir, 'Acme_course_20240305.pdf');
    expect(outcome).toEqual({ kind: 'renamed', destinationPath: destination });
    expect(fs.existsSync(source)).toBe(false);
    expect(fs.readFileSync(destination, 'utf8')).toBe('invoice');
  });

  it('should not overwrite an existing file', async () => {
    const source = writeFile('scan001.pdf', 'new invoice');
    const existing = writeFile('Acme_course_20240305.pdf', 'old invoice');
    const renamer = new LocalFileRenamer();

    const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

    expect(outcome).toEqual({ kind: 'skipped-exists', destinationPath: existing });
    expect(fs.readFileSync(source, 'utf8')).toBe('new invoice');
    expect(fs.readFileSync(existing, 'utf8')).toBe('old invoice');
  });

  it('should treat a file that already has the target name as existing', async () => {
    const source = writeFile('Acme_course_20240305.pdf', 'invoice');
    const renamer = new LocalFileRenamer();

    const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

    expect(outcome).toEqual({ kind: 'skipped-exists', destinationPath: source });
    expect(fs.readFileSync(source, 'utf8')).toBe('invoice');
  });

  it('should not overwrite a folder with the target name', async () => {
    const source = writeFile('scan001.pdf', 'invoice');
    fs.mkdirSync(path.join(tmpDir, 'Acme_course_20240305.pdf'));
    const renamer = new LocalFileRenamer();

    const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

    expect(outcome.kind).toBe('skipped-exists');
    expect(fs.existsSync(source)).toBe(true);
  });

  it('should report a failed rename instead of throwing', async () => {
    const source = path.join(tmpDir, 'missing.pdf');
    const renamer = new LocalFileRenamer();

    const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

    expect(outcome.kind).toBe('failed');
    if (outcome.kind === 'failed') {
      expect(outcome.destinationPath).toBe(path.join(tmpDir, 'Acme_course_20240305.pdf'));
      expect(outcome.message).toContain('ENOENT');
    }
  });

  describe('dry run', () => {
    it('should report the planned name without renaming', async () => {
      const source = writeFile('scan001.pdf', 'invoice');
      const renamer = new LocalFileRenamer({ dryRun: true });

      const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

      expect(outcome).toEqual({
        kind: 'planned',
        destinationPath: path.join(tmpDir, 'Acme_course_20240305.pdf')
      });
      expect(fs.existsSync(source)).toBe(true);
      expect(fs.existsSync(path.join(tmpDir, 'Acme_course_20240305.pdf'))).toBe(false);
    });

    it('should treat a name planned earlier in the run as taken', async () => {
      const first = writeFile('scan001.pdf', 'first');
      const second = writeFile('scan002.pdf', 'second');
      const renamer = new LocalFileRenamer({ dryRun: true });

      const firstOutcome = await renamer.rename(first, 'Acme_course_20240305.pdf');
      const secondOutcome = await renamer.rename(second, 'Acme_course_20240305.pdf');

      expect(firstOutcome.kind).toBe('planned');
      expect(secondOutcome).toEqual({
        kind: 'skipped-exists',
        destinationPath: path.join(tmpDir, 'Acme_course_20240305.pdf')
      });
    });

    it('should still report collisions', async () => {
      const source = writeFile('scan001.pdf', 'invoice');
      writeFile('Acme_course_20240305.pdf', 'other');
      const renamer = new LocalFileRenamer({ dryRun: true });

      const outcome = await renamer.rename(source, 'Acme_course_20240305.pdf');

      expect(outcome.kind).toBe('skipped-exists');
    });
  });
});
