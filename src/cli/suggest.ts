/**
 * Suggest command
 *
 * Reads a description file, asks its engine for suggestions on one term and
 * prints them one per line. Gives up once the deadline passes.
 */

import { readFile } from 'node:fs/promises';
import type { Container } from '../core/container.js';

export interface SuggestOptions {
  /** Path of the OpenSearch description document */
  file: string;
  term: string;
  /** Deadline for the suggestions response */
  timeoutMs: number;
}

export interface SuggestOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

async function readDescription(file: string): Promise<Uint8Array | null> {
  try {
    return await readFile(file);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Run the command.
 *
 * @returns process exit code: 0 when suggestions arrived, 1 otherwise
 */
export async function runSuggest(
  options: SuggestOptions,
  container: Pick<Container, 'reader' | 'logger'>,
  output: SuggestOutput
): Promise<number> {
  const { file, term, timeoutMs } = options;
  const logger = container.logger.child({ component: 'cli' });

  const document = await readDescription(file);
  if (!document) {
    output.stderr(`File ${file} does not exist.\n`);
    return 1;
  }

  const { reader } = container;
  const engine = reader.read(document);
  if (reader.hasError()) {
    output.stderr(`Error: ${reader.errorString()}\n`);
    return 1;
  }

  if (!engine.isValid()) {
    output.stderr('The OpenSearch description is invalid.\n');
    return 1;
  }

  if (!engine.providesSuggestions()) {
    output.stderr(`${engine.getName()} does not provide suggestions.\n`);
    return 1;
  }

  logger.debug({ engine: engine.getName(), term, timeoutMs }, 'Requesting suggestions');

  const suggestions = await new Promise<string[] | null>((resolve) => {
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort();
    }, timeoutMs);

    const unsubscribe = engine.onSuggestions((list) => {
      clearTimeout(timer);
      unsubscribe();
      resolve(list);
    });

    deadline.signal.addEventListener(
      'abort',
      () => {
        unsubscribe();
        resolve(null);
      },
      { once: true }
    );

    engine.requestSuggestions(term, { signal: deadline.signal });
  });

  if (!suggestions) {
    output.stderr(`No suggestions received within ${String(timeoutMs)} ms.\n`);
    return 1;
  }

  output.stdout(suggestions.length === 0 ? 'No suggestions.\n' : `${suggestions.join('\n')}\n`);
  return 0;
}
