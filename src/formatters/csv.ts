/**
 * CSV formatter
 * Exports a shaped character dataset as a CSV file
 */
import * as path from 'path';
import { Dataset } from '../types/data';
import { OutputConfig } from '../types/config';
import { ensureDirectoryExists, writeDatasetToCsv } from '../io/file';
import { describeError } from '../errors';

/**
 * CSV formatter class
 */
export class CsvFormatter {
  /**
   * @param config output settings
   */
  constructor(private config: OutputConfig) {}

  /**
   * Writes the dataset to `<directory>/<filename>`
   * An empty dataset still produces the header row.
   * @returns output file path
   */
  async writeData(dataset: Dataset): Promise<string> {
    try {
      await ensureDirectoryExists(this.config.directory);

      const filePath = path.join(this.config.directory, this.config.filename);
      await writeDatasetToCsv(filePath, dataset);

      console.log(`Wrote ${dataset.length} rows to ${filePath}`);
      return filePath;
    } catch (error) {
      throw new Error(`CSV output failed: ${describeError(error)}`);
    }
  }
}
