import { readdir, readFile, stat } from 'fs/promises';
import { join, extname, basename, normalize } from 'path';
import type { ImageSource } from '@gridscan/types';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

export const SUPPORTED_IMAGE_EXTENSIONS = Object.keys(MIME_TYPES);

export interface ImageFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface ScanResult {
  files: ImageFileInfo[];
  skipped: SkippedFile[];
  directoryPath: string;
}

export interface DirectoryCheck {
  valid: boolean;
  error?: string;
}

/**
 * MIME type for an image path, by extension (case-insensitive).
 */
export function mimeTypeForPath(filePath: string): string | undefined {
  return MIME_TYPES[extname(filePath).toLowerCase()];
}

/**
 * Read an image file into an ImageSource.
 */
export async function loadImageSource(filePath: string): Promise<ImageSource> {
  const mimeType = mimeTypeForPath(filePath);
  if (mimeType === undefined) {
    throw new Error(
      `Unsupported image type: ${filePath} (expected ${SUPPORTED_IMAGE_EXTENSIONS.join(', ')})`
    );
  }

  const data = await readFile(filePath);
  return {
    data: new Uint8Array(data),
    mimeType,
    fileName: basename(filePath),
  };
}

/**
 * Scans a directory for image files, filtering out temporary/invalid files.
 * Returns files sorted by filename ascending for deterministic processing.
 */
export async function scanDirectoryForImages(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const files: ImageFileInfo[] = [];
  const skipped: SkippedFile[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      continue;
    }

    const fileName = entry.name;
    const filePath = join(normalizedPath, fileName);

    if (mimeTypeForPath(fileName) === undefined) {
      continue;
    }

    // Editor lock files and hidden files
    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const fileStat = await stat(filePath);

    if (fileStat.size === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({
      filePath,
      fileName,
      sizeBytes: fileStat.size,
      modifiedAt: fileStat.mtime,
    });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));

  return {
    files,
    skipped,
    directoryPath: normalizedPath,
  };
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<DirectoryCheck> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }

    return { valid: true };
  } catch (error) {
    if (error instanceof Error && 'code' in error) {
      if (error.code === 'ENOENT') {
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      }
      if (error.code === 'EACCES') {
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      }
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}
