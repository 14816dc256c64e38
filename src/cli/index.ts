#!/usr/bin/env node

import 'dotenv/config';

import { buildApplication, buildCommand, run } from '@stricli/core';
import { createContainerAsync } from '../core/container.js';
import { runSuggest } from './suggest.js';

/** Result of the suggest command; applied after stricli has set its own exit code */
let commandExitCode = 0;

function parseTimeout(input: string): number {
  const value = parseInt(input, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid timeout: ${input}`);
  }
  return value;
}

const suggestCommand = buildCommand<{ timeout?: number }, [string, string]>({
  docs: {
    brief: 'Print search suggestions from an OpenSearch description',
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'Path of the OpenSearch description document',
          parse: String,
          placeholder: 'file',
        },
        {
          brief: 'Term to request suggestions for',
          parse: String,
          placeholder: 'term',
        },
      ],
    },
    flags: {
      timeout: {
        kind: 'parsed',
        brief: 'Milliseconds to wait for suggestions (default from config)',
        parse: parseTimeout,
        optional: true,
      },
    },
  },
  async func(flags: { timeout?: number }, file: string, term: string) {
    try {
      const container = await createContainerAsync();
      commandExitCode = await runSuggest(
        { file, term, timeoutMs: flags.timeout ?? container.config.suggestions.timeoutMs },
        container,
        {
          stdout: (text) => process.stdout.write(text),
          stderr: (text) => process.stderr.write(text),
        }
      );
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      commandExitCode = 1;
    }
  },
});

const app = buildApplication(suggestCommand, {
  name: 'opensearch-suggest',
  versionInfo: {
    currentVersion: '0.1.0',
  },
});

async function main(): Promise<void> {
  await run(app, process.argv.slice(2), { process });
  if (commandExitCode !== 0) {
    process.exitCode = commandExitCode;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
