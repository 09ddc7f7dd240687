import * as fs from 'fs';
import { Logger } from './logger.js';

/**
 * Reads a whole file. Returns undefined when the file cannot be read or is
 * empty.
 */
export function readFileBytes(filePath: string): Buffer | undefined {
  try {
    const data = fs.readFileSync(filePath);
    return data.length > 0 ? data : undefined;
  } catch (err) {
    Logger.log(`Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

/**
 * Writes `data` to `filePath`, truncating it. Returns false when the file
 * cannot be opened or written.
 */
export function writeFileBytes(filePath: string, data: Uint8Array): boolean {
  try {
    fs.writeFileSync(filePath, data);
    return true;
  } catch (err) {
    Logger.log(`Failed to write ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}
