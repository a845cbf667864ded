/**
 * Reads configuration text from a file or stdin
 */

import { readFile } from 'node:fs/promises';

export const STDIN_SOURCE = '-';

export interface ConfigInput {
  /** File path, or "-" for stdin */
  source: string;
  text: string;
}

export async function readConfigText(
  configPath: string | undefined,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<ConfigInput> {
  if (configPath !== undefined && configPath !== STDIN_SOURCE) {
    return { source: configPath, text: await readFile(configPath, 'utf-8') };
  }

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return { source: STDIN_SOURCE, text: Buffer.concat(chunks).toString('utf-8') };
}
