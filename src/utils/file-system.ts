/**
 * File system operations - reading, copying, and globbing.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

/** Mode applied to installed hook scripts. */
export const EXECUTABLE_MODE = 0o755;

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file or directory exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a directory entry exists, without following a final symlink.
 * A dangling symlink counts as present.
 */
export async function entryExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.lstat(filePath);
    return true;
  } catch { /* no entry */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a path is a regular file.
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a directory exists and has at least one entry.
 */
export async function isNonEmptyDirectory(dirPath: string): Promise<boolean> {
  try {
    const entries = await fs.promises.readdir(dirPath);
    return entries.length > 0;
  } catch { /* not a directory */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find entries matching glob patterns. Sorted, so listings are stable across platforms.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    onlyDirectories?: boolean;
  } = {}
): Promise<string[]> {
  const entries = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || [],
    absolute: options.absolute ?? true,
    onlyFiles: !options.onlyDirectories,
    onlyDirectories: options.onlyDirectories ?? false,
    deep: 1,
  });
  return entries.sort();
}

/**
 * Copy a single file, failing with EEXIST when the destination already exists.
 */
export async function copyFileExclusive(source: string, destination: string): Promise<void> {
  await fs.promises.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
}

/**
 * Copy a single file, replacing any existing destination.
 */
export async function copyFileReplacing(source: string, destination: string): Promise<void> {
  await fs.promises.copyFile(source, destination);
}

/**
 * Recursively copy a directory, failing when the destination already exists.
 */
export async function copyDirectory(source: string, destination: string): Promise<void> {
  await fs.promises.cp(source, destination, {
    recursive: true,
    force: false,
    errorOnExist: true,
  });
}

/**
 * Mark a file as executable.
 */
export async function makeExecutable(filePath: string): Promise<void> {
  await fs.promises.chmod(filePath, EXECUTABLE_MODE);
}

/**
 * Rename a file or directory.
 */
export async function movePath(from: string, to: string): Promise<void> {
  await fs.promises.rename(from, to);
}

/**
 * Compare two files byte-for-byte.
 */
export async function filesEqual(a: string, b: string): Promise<boolean> {
  const left = await fs.promises.readFile(a);
  const right = await fs.promises.readFile(b);
  return left.equals(right);
}
