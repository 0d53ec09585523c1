import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadImageSource,
  mimeTypeForPath,
  scanDirectoryForImages,
  validateDirectory,
} from '@gridscan/locators';

describe('image-files', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `gridscan-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('mimeTypeForPath', () => {
    it('should map known extensions case-insensitively', () => {
      expect(mimeTypeForPath('scan.PNG')).toBe('image/png');
      expect(mimeTypeForPath('scan.jpeg')).toBe('image/jpeg');
      expect(mimeTypeForPath('scan.tif')).toBe('image/tiff');
    });

    it('should return undefined for other files', () => {
      expect(mimeTypeForPath('scan.pdf')).toBeUndefined();
      expect(mimeTypeForPath('scan')).toBeUndefined();
    });
  });

  describe('loadImageSource', () => {
    it('should read bytes, MIME type and file name', async () => {
      const filePath = join(testDir, 'receipt.jpg');
      await writeFile(filePath, Buffer.from([0xff, 0xd8, 0xff]));

      const image = await loadImageSource(filePath);

      expect(image.mimeType).toBe('image/jpeg');
      expect(image.fileName).toBe('receipt.jpg');
      expect(Array.from(image.data)).toEqual([0xff, 0xd8, 0xff]);
    });

    it('should reject unsupported extensions', async () => {
      const filePath = join(testDir, 'notes.txt');
      await writeFile(filePath, 'hello');

      await expect(loadImageSource(filePath)).rejects.toThrow('Unsupported image type');
    });
  });

  describe('validateDirectory', () => {
    it('should accept an existing directory', async () => {
      await expect(validateDirectory(testDir)).resolves.toEqual({ valid: true });
    });

    it('should reject a missing directory', async () => {
      const missing = join(testDir, 'nope');
      const result = await validateDirectory(missing);

      expect(result).toEqual({ valid: false, error: `Directory does not exist: ${missing}` });
    });

    it('should reject a file path', async () => {
      const filePath = join(testDir, 'page.png');
      await writeFile(filePath, 'x');

      const result = await validateDirectory(filePath);

      expect(result.valid).toBe(false);
      expect(result.error).toContain('not a directory');
    });
  });

  describe('scanDirectoryForImages', () => {
    it('should list supported images sorted by name', async () => {
      await writeFile(join(testDir, 'page2.png'), 'x');
      await writeFile(join(testDir, 'page1.jpg'), 'x');
      await writeFile(join(testDir, 'page3.webp'), 'x');
      await writeFile(join(testDir, 'readme.txt'), 'x');
      await mkdir(join(testDir, 'nested.png'));

      const result = await scanDirectoryForImages(testDir);

      expect(result.files.map(file => file.fileName)).toEqual(['page1.jpg', 'page2.png', 'page3.webp']);
      expect(result.files[0]?.filePath).toBe(join(testDir, 'page1.jpg'));
      expect(result.files[0]?.sizeBytes).toBe(1);
      expect(result.skipped).toEqual([]);
    });

    it('should skip temporary, hidden and empty files', async () => {
      await writeFile(join(testDir, 'page.png'), 'x');
      await writeFile(join(testDir, '~$page.png'), 'x');
      await writeFile(join(testDir, '.page.png'), 'x');
      await writeFile(join(testDir, 'blank.png'), '');

      const result = await scanDirectoryForImages(testDir);

      expect(result.files.map(file => file.fileName)).toEqual(['page.png']);
      const skipped = [...result.skipped].sort((a, b) => (a.fileName < b.fileName ? -1 : 1));
      expect(skipped).toEqual([
        { fileName: '.page.png', reason: 'Temporary file (starts with ~$ or .)' },
        { fileName: 'blank.png', reason: 'Zero-byte file' },
        { fileName: '~$page.png', reason: 'Temporary file (starts with ~$ or .)' },
      ]);
    });
  });
});
