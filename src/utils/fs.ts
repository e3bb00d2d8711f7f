import { existsSync, mkdirSync, statSync } from 'fs';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Size of a file in bytes, or 0 when it does not exist
 */
export function fileSize(filePath: string): number {
  return existsSync(filePath) ? statSync(filePath).size : 0;
}
