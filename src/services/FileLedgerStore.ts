import * as fs from 'fs';
import * as path from 'path';
import type { LedgerStore } from '../core/session/SessionPorts';
import { PersistenceError, errorMessage } from '../core/errors';
import { ANNOTATION_FILES } from '../config/FileConfig';
import { isNotFound } from './fsErrors';

/**
 * Completion ledger kept as a text file with one identity per line,
 * `<outputDir>/.annotated.txt`. A missing file is an empty ledger.
 */
export class FileLedgerStore implements LedgerStore {
  readonly file: string;

  constructor(outputDir: string) {
    this.file = path.join(outputDir, ANNOTATION_FILES.LEDGER);
  }

  async readAll(): Promise<string[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new PersistenceError(`Cannot read ledger (${errorMessage(err)})`, this.file);
    }
    return text.split(/\r?\n/).filter((line) => line.length > 0);
  }

  async append(identity: string): Promise<void> {
    try {
      await fs.promises.appendFile(this.file, `${identity}\n`, 'utf-8');
    } catch (err) {
      throw new PersistenceError(`Cannot append to ledger (${errorMessage(err)})`, this.file);
    }
  }
}
