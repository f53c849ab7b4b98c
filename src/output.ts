import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';

export const DEFAULT_OUTPUT_DIR = './output';

const MAX_SLUG_LENGTH = 50;

/** Lowercase ASCII token safe for filenames. Always matches /^[a-z0-9-]{0,50}$/. */
export function slugify(text: string, maxLength = MAX_SLUG_LENGTH): string {
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '')
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

// Second precision: two calls with the same seed in the same second resolve to the same name.
export function generateFilename(seedText: string, extension = 'png', now: Date = new Date()): string {
  return `${slugify(seedText)}_${formatTimestamp(now)}.${extension}`;
}

export interface ResolveOptions {
  outputDir?: string;
  explicitPath?: string;
  extension?: string;
  now?: Date;
}

export async function resolveOutputPath(seedText: string, options: ResolveOptions = {}): Promise<string> {
  if (options.explicitPath) {
    await fs.mkdir(path.dirname(path.resolve(options.explicitPath)), { recursive: true });
    return options.explicitPath;
  }

  const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
  await fs.mkdir(outputDir, { recursive: true });
  return path.join(outputDir, generateFilename(seedText, options.extension ?? 'png', options.now));
}

export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

function tempPathFor(dstPath: string): string {
  return `${dstPath}.tmp.${process.pid}.${randomBytes(8).toString('hex')}`;
}

/**
 * Writes through a sibling temp file and renames it into place, so readers
 * never observe a partially written image.
 */
export async function writeAtomic(dstPath: string, write: (tempPath: string) => Promise<unknown>): Promise<void> {
  const tempPath = tempPathFor(dstPath);
  try {
    await write(tempPath);
    await fs.rename(tempPath, dstPath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

export async function writeFileAtomic(dstPath: string, data: Uint8Array): Promise<void> {
  await writeAtomic(dstPath, (tempPath) => fs.writeFile(tempPath, data));
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
