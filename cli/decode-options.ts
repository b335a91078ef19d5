#!/usr/bin/env npx tsx
/**
 * CLI tool to decode options against a schema.
 *
 * Usage:
 *   npx tsx cli/decode-options.ts <schema.json> [--id=ID] [name[=value] ...]
 *
 * Each argument is one occurrence; repeat a name to build a list.
 * Prints the decoded record as JSON (64-bit integers as decimal strings).
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaDecoder } from '../src/schema/SchemaDecoder';
import type { SchemaNode } from '../src/schema/SchemaBuilder';
import type { RawOption } from '../src/RawOption';
import { OptionsError } from '../src/errors';

function toRawOption(arg: string): RawOption {
  const eq = arg.indexOf('=');
  return eq < 0 ? { name: arg } : { name: arg.slice(0, eq), value: arg.slice(eq + 1) };
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length < 1) {
    console.error('Usage: npx tsx cli/decode-options.ts <schema.json> [--id=ID] [name[=value] ...]');
    process.exit(1);
  }

  const schemaPath = path.resolve(args[0]);
  if (!fs.existsSync(schemaPath)) {
    console.error(`Error: schema file not found: ${schemaPath}`);
    process.exit(1);
  }

  const schema = JSON.parse(fs.readFileSync(schemaPath, 'utf-8')) as SchemaNode;

  let id: string | undefined;
  const options: RawOption[] = [];
  for (const arg of args.slice(1)) {
    if (arg.startsWith('--id=')) {
      id = arg.slice('--id='.length);
    } else {
      options.push(toRawOption(arg));
    }
  }

  try {
    const decoded = new SchemaDecoder(schema).decode({ options, id });
    const json = JSON.stringify(
      decoded,
      (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
      2,
    );
    process.stdout.write(json + '\n');
  } catch (err) {
    if (err instanceof OptionsError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

main();
