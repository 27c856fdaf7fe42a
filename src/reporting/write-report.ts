import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

/**
 * Write a rendered report to disk, creating parent directories if they do
 * not already exist.
 */
export function writeReportFile(outputPath: string, content: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, content, 'utf-8');
}
