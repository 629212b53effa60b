import { Readable } from 'stream';
import { InputError } from '../ddl-architect.errors';
import { InputService } from './input.service';

describe('InputService', () => {
  const service = new InputService();

  it('reads everything from stdin when no file is given', async () => {
    const stdin = Readable.from(['CREATE TABLE ', 'a (id INT);']);

    await expect(service.read(undefined, stdin)).resolves.toBe('CREATE TABLE a (id INT);');
  });

  it('treats "-" as stdin', async () => {
    await expect(service.read('-', Readable.from([Buffer.from('SELECT 1;')]))).resolves.toBe('SELECT 1;');
  });

  it('refuses an interactive terminal', async () => {
    const stdin = Object.assign(Readable.from([]), { isTTY: true });

    await expect(service.read(undefined, stdin)).rejects.toThrow(
      new InputError('No input file given and stdin is a terminal'),
    );
  });

  it('reports a missing file', async () => {
    await expect(service.read('/nonexistent/schema.sql')).rejects.toThrow(
      new InputError('Cannot read /nonexistent/schema.sql'),
    );
  });
});
