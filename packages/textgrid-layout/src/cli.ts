/**
 * CLI for textgrid-layout
 */

import { program } from 'commander';
import { readFile } from 'fs/promises';
import { GridPlacer } from './grid-placer';
import { parseLayout } from './layout';
import { createConstraintRecord, formatAnchor, formatFill, parseConstraints } from './constraint';
import { isLayoutError } from './errors';
import type { ConstraintRecord } from './types';

const VERSION = '1.0.0';

program
  .name('textgrid-layout')
  .description('Parse 2D text grid layouts and constraint strings into placement data')
  .version(VERSION);

program
  .command('parse <input>')
  .description('Parse a layout file (or - for stdin) and print its regions as JSON')
  .option('--compact', 'Print JSON on a single line')
  .action(async (input: string, options: OutputOptions) => {
    try {
      const layout = await readInput(input);
      const registry = parseLayout(layout);
      console.log(toJson(registry.toJSON(), options));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('constraints <tokens...>')
  .description('Interpret constraint tokens over the default record and print the result')
  .option('--compact', 'Print JSON on a single line')
  .action((tokens: string[], options: OutputOptions) => {
    try {
      const record = parseConstraints(createConstraintRecord(), ...tokens);
      console.log(toJson(describeRecord(record), options));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('place <input> <name> [constraints...]')
  .description('Parse a layout file and print the placement of one region')
  .option('-d, --defaults <constraints>', 'Default constraints, e.g. "fill xy insets* 2"')
  .option('--compact', 'Print JSON on a single line')
  .action(async (input: string, name: string, constraints: string[], options: PlaceOptions) => {
    try {
      const layout = await readInput(input);
      const placer = new GridPlacer(options.defaults);
      placer.parseLayout(layout);
      const placement = placer.place(name, ...constraints);
      console.log(toJson({ ...placement, constraints: describeRecord(placement.constraints) }, options));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);

// Helper functions

interface OutputOptions {
  compact?: boolean;
}

interface PlaceOptions extends OutputOptions {
  defaults?: string;
}

function describeRecord(record: ConstraintRecord): Record<string, unknown> {
  return {
    ...record,
    anchor: formatAnchor(record.anchor),
    fill: formatFill(record.fill),
  };
}

function toJson(value: unknown, options: OutputOptions): string {
  return JSON.stringify(value, null, options.compact ? 0 : 2);
}

function fail(error: unknown): never {
  if (isLayoutError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
}

async function readInput(input: string): Promise<string> {
  return input === '-' ? readStdin() : readFile(input, 'utf-8');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];

  return new Promise((resolve, reject) => {
    process.stdin.on('data', (chunk: Buffer) => chunks.push(chunk));
    process.stdin.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    process.stdin.on('error', reject);
  });
}
