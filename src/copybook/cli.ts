import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_TABLE_NAME } from '../constants.js';
import { resolveDdlNamespace, validateNamespace } from '../shared/index.js';
import { generateCreateTable } from './ddl.js';
import { scanCopybook } from './parseCopybook.js';

interface DdlArgs {
  json: boolean;
  source?: string;
  table?: string;
  namespace?: string;
  output?: string;
}

export interface DdlCliIo {
  stdout: (text: string) => void;
}

const defaultIo: DdlCliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
};

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseArgs(argv: string[]): DdlArgs {
  const out: DdlArgs = { json: false };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--json') out.json = true;
    else if (arg === '--source') out.source = takeValue(argv, ++index, arg);
    else if (arg === '--table') out.table = takeValue(argv, ++index, arg);
    else if (arg === '--namespace') out.namespace = takeValue(argv, ++index, arg);
    else if (arg === '--output') out.output = takeValue(argv, ++index, arg);
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else throw new Error(`Unknown arg: ${String(arg)}`);
  }
  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  copybook-mcp ddl --source <copybook.cpy> [--table customer] [--namespace bronze] [--output <file.sql>]',
    '  copybook-mcp ddl --source <copybook.cpy> --json    # fields + ddl as JSON',
  ].join('\n');
}

export async function runDdlCli(argv: string[], io: DdlCliIo = defaultIo): Promise<void> {
  let args: DdlArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return;
    }
    throw new Error(`${message}\n${usage()}`);
  }

  if (!args.source) throw new Error(`Missing required --source\n${usage()}`);
  const source = path.resolve(args.source);
  const content = await fs.promises.readFile(source, 'utf-8');

  const tableName = args.table ?? DEFAULT_TABLE_NAME;
  const namespace = args.namespace !== undefined
    ? validateNamespace(args.namespace, '--namespace')
    : resolveDdlNamespace();

  const { fields, report } = scanCopybook(content);
  const ddl = generateCreateTable(fields, tableName, { namespace });
  const text = args.json
    ? `${JSON.stringify({ fields, ddl, report }, null, 2)}\n`
    : `${ddl}\n`;

  if (report.fallback_fields.length > 0) {
    console.error(`[copybook-mcp] ${report.fallback_fields.length} field(s) typed as VARCHAR(255):`,
      report.fallback_fields.join(', '));
  }
  if (fields.length === 0) {
    console.error(`[copybook-mcp] No PIC-bearing fields in ${source}`);
  }

  if (args.output) {
    const output = path.resolve(args.output);
    await fs.promises.writeFile(output, text, 'utf-8');
    console.error('[copybook-mcp] DDL written:', JSON.stringify({ output, columns: fields.length }));
    return;
  }
  io.stdout(text);
}
