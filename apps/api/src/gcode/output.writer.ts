import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

export interface OutputFile {
  name: string;
  content: string;
}

/**
 * Writes a program package into a directory, creating it when missing.
 * Existing files with the same names are replaced.
 */
@Injectable()
export class OutputWriter {
  private readonly logger = new Logger(OutputWriter.name);

  async write(directory: string, files: readonly OutputFile[]): Promise<string[]> {
    await mkdir(directory, { recursive: true });
    for (const file of files) {
      await writeFile(path.join(directory, file.name), file.content, 'utf8');
    }
    this.logger.log(`Wrote ${files.length} file(s) to ${directory}`);
    return files.map((file) => file.name);
  }
}
