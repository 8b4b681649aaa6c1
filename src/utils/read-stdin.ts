import type { Readable } from 'node:stream';

/**
 * Read a stream to its end as UTF-8 text.
 *
 * @param stream - Defaults to standard input
 */
export async function readStdin(
  stream: Readable = process.stdin
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    const data: unknown = chunk;
    if (typeof data === 'string') {
      chunks.push(Buffer.from(data, 'utf8'));
    } else if (Buffer.isBuffer(data)) {
      chunks.push(data);
    }
  }
  return Buffer.concat(chunks).toString('utf8');
}
