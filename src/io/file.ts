/**
 * File operations
 */
import * as fs from 'fs';
import { CHARACTER_COLUMNS } from '../shaper';
import { Dataset } from '../types/data';

/**
 * Creates the directory when it does not exist
 * @param dirPath directory path
 */
export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.promises.access(dirPath);
  } catch (error) {
    await fs.promises.mkdir(dirPath, { recursive: true });
    console.log(`Created directory: ${dirPath}`);
  }
}

/**
 * Quotes a field containing a delimiter, quote or line break (RFC 4180)
 */
export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Builds CSV content from the dataset, header row first
 * @returns CSV text ending with a newline
 */
export function generateCsvContent(dataset: Dataset): string {
  const header = CHARACTER_COLUMNS.join(',');
  const rows = dataset.map(row =>
    CHARACTER_COLUMNS.map(column => escapeCsvField(row[column])).join(',')
  );
  return [header, ...rows].join('\n') + '\n';
}

/**
 * Writes the dataset to a CSV file
 * @param filePath destination path
 */
export async function writeDatasetToCsv(filePath: string, dataset: Dataset): Promise<void> {
  await fs.promises.writeFile(filePath, generateCsvContent(dataset), 'utf-8');
}
