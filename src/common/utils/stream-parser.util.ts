import { StringDecoder } from 'string_decoder';

/**
 * Splits a chunked byte stream into lines, carrying a partial trailing line
 * over to the next chunk. A trailing `\r` is stripped from every line.
 */
export class LineSplitter {
  private buffer = '';
  private readonly decoder = new StringDecoder('utf8');

  push(chunk: Buffer | string): string[] {
    this.buffer +=
      typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.map(stripCarriageReturn);
  }

  flush(): string[] {
    const rest = this.buffer + this.decoder.end();
    this.buffer = '';
    return rest === '' ? [] : [stripCarriageReturn(rest)];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
