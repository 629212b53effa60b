import { Injectable } from '@nestjs/common';
import * as fs from 'fs';
import { InputError } from '../ddl-architect.errors';

type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

@Injectable()
export class InputService {
  /**
   * Reads `file`, or the whole of `stdin` when no file (or `-`) is given.
   */
  async read(file?: string, stdin: InputStream = process.stdin): Promise<string> {
    if (file && file !== '-') {
      try {
        return await fs.promises.readFile(file, 'utf8');
      } catch (error) {
        throw new InputError(`Cannot read ${file}`, { cause: error });
      }
    }

    if (stdin.isTTY) {
      throw new InputError('No input file given and stdin is a terminal');
    }

    const chunks: Buffer[] = [];
    for await (const chunk of stdin) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
  }
}
