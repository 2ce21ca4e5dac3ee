import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { handleToolCall } from '../src/tools/dispatcher.js';

const CUSTOMER = [
  '01  CUSTOMER-RECORD.',
  '    05  CUSTOMER-ID       PIC 9(10).',
  '    05  CUSTOMER-NAME.',
  '        10  FIRST-NAME    PIC X(30).',
  '        10  LAST-NAME     PIC X(30).',
  '    05  ACCOUNT-BALANCE   PIC S9(13)V99.',
].join('\n');

const CUSTOMER_DDL =
  'CREATE TABLE bronze.customer (\n' +
  '    customer_id BIGINT,\n' +
  '    first_name VARCHAR(30),\n' +
  '    last_name VARCHAR(30),\n' +
  '    account_balance DECIMAL(15,2)\n' +
  ');';

async function callJson(name: string, args: Record<string, unknown>, mode: 'standard' | 'full' = 'standard') {
  const result = await handleToolCall(name, args, mode);
  const text = result.content[0]?.text ?? '';
  return { isError: result.isError, data: JSON.parse(text) };
}

describe('copybook tools', () => {
  const saved = {
    namespace: process.env.COPYBOOK_DDL_NAMESPACE,
    mode: process.env.COPYBOOK_TOOL_MODE,
  };

  beforeEach(() => {
    delete process.env.COPYBOOK_DDL_NAMESPACE;
    delete process.env.COPYBOOK_TOOL_MODE;
  });

  afterEach(() => {
    if (saved.namespace === undefined) delete process.env.COPYBOOK_DDL_NAMESPACE;
    else process.env.COPYBOOK_DDL_NAMESPACE = saved.namespace;
    if (saved.mode === undefined) delete process.env.COPYBOOK_TOOL_MODE;
    else process.env.COPYBOOK_TOOL_MODE = saved.mode;
  });

  it('copybook_parse returns fields, ddl and a clean report', async () => {
    const { isError, data } = await callJson('copybook_parse', { copybook: CUSTOMER, table_name: 'customer' });
    expect(isError).toBeUndefined();
    expect(data.fields.length).toBe(4);
    expect(data.fields[0]).toEqual({
      level: 5,
      name: 'CUSTOMER-ID',
      pic: '9(10)',
      sql_type: 'BIGINT',
      length: 10,
      parent: 'CUSTOMER-RECORD',
    });
    expect(data.fields[3].parent).toBe('CUSTOMER-RECORD');
    expect(data.ddl).toBe(CUSTOMER_DDL);
    expect(data.report.group_count).toBe(2);
    expect(data.warnings).toEqual([]);
  });

  it('copybook_parse defaults the table name', async () => {
    const { data } = await callJson('copybook_parse', { copybook: '01 FLAG PIC X(1).' });
    expect(data.ddl).toBe('CREATE TABLE bronze.table (\n    flag VARCHAR(1)\n);');
  });

  it('copybook_parse takes the namespace from the environment, then from the argument', async () => {
    process.env.COPYBOOK_DDL_NAMESPACE = 'silver';
    const fromEnv = await callJson('copybook_parse', { copybook: CUSTOMER, table_name: 'customer' });
    expect(fromEnv.data.ddl.split('\n')[0]).toBe('CREATE TABLE silver.customer (');

    const fromArg = await callJson('copybook_parse', { copybook: CUSTOMER, table_name: 'customer', namespace: 'gold' });
    expect(fromArg.data.ddl.split('\n')[0]).toBe('CREATE TABLE gold.customer (');
  });

  it('copybook_parse rejects a namespace that is not an identifier', async () => {
    const { isError, data } = await callJson('copybook_parse', { copybook: CUSTOMER, namespace: 'bad name' });
    expect(isError).toBe(true);
    expect(data.error.code).toBe('INVALID_PARAMS');
    expect(data.error.message).toBe('namespace must be a plain SQL identifier');
  });

  it('copybook_parse warns about fallback typing', async () => {
    const { data } = await callJson('copybook_parse', {
      copybook: '01 REC.\n  05 COUNTER PIC S9(4)COMP.',
      table_name: 'counters',
    });
    expect(data.fields[0].sql_type).toBe('VARCHAR(255)');
    expect(data.fields[0].length).toBe(255);
    expect(data.warnings).toEqual(['COUNTER: unrecognized PIC clause, typed as VARCHAR(255)']);
  });

  it('copybook_parse keeps the empty CREATE TABLE by default', async () => {
    const { isError, data } = await callJson('copybook_parse', { copybook: '' });
    expect(isError).toBeUndefined();
    expect(data.fields).toEqual([]);
    expect(data.ddl).toBe('CREATE TABLE bronze.table (\n\n);');
    expect(data.warnings).toEqual(['No PIC-bearing fields found; CREATE TABLE has an empty column list']);
  });

  it('copybook_parse fails with EMPTY_LAYOUT when columns are required', async () => {
    const { isError, data } = await callJson('copybook_parse', {
      copybook: '01 ONLY-A-GROUP.',
      require_columns: true,
    });
    expect(isError).toBe(true);
    expect(data.error.code).toBe('EMPTY_LAYOUT');
    expect(data.error.data).toEqual({ total_lines: 1, group_count: 1 });
  });

  it('rejects missing arguments with zod issues attached', async () => {
    const { isError, data } = await callJson('copybook_parse', {});
    expect(isError).toBe(true);
    expect(data.error.code).toBe('INVALID_PARAMS');
    expect(data.error.message).toBe('Invalid parameters for copybook_parse');
    expect(data.error.data.issues[0].path).toEqual(['copybook']);
  });

  it('rejects table names with characters outside letters, digits and underscores', async () => {
    const { isError, data } = await callJson('copybook_generate_ddl', { copybook: CUSTOMER, table_name: 'bad-name' });
    expect(isError).toBe(true);
    expect(data.error.code).toBe('INVALID_PARAMS');
  });

  it('copybook_generate_ddl returns the statement and column count', async () => {
    const { data } = await callJson('copybook_generate_ddl', { copybook: CUSTOMER, table_name: 'customer' });
    expect(data).toEqual({ table: 'bronze.customer', column_count: 4, ddl: CUSTOMER_DDL });
  });

  it('copybook_interpret_pic maps a single clause', async () => {
    const { data } = await callJson('copybook_interpret_pic', { pic: '9(5)V99' });
    expect(data).toEqual({
      pic: '9(5)V99',
      kind: 'decimal',
      sql_type: 'DECIMAL(7,2)',
      length: 7,
      precision: 7,
      scale: 2,
    });
  });

  it('copybook_classify_lines is only exposed in full mode', async () => {
    const hidden = await callJson('copybook_classify_lines', { copybook: '01 A.' });
    expect(hidden.isError).toBe(true);
    expect(hidden.data.error.message).toBe('Tool not exposed in standard mode: copybook_classify_lines');

    const shown = await callJson('copybook_classify_lines', { copybook: '01 A.\n* note\n05 B PIC X(2).' }, 'full');
    expect(shown.data).toEqual([
      { line: 1, kind: 'group', level: 1, name: 'A' },
      { line: 2, kind: 'skip' },
      { line: 3, kind: 'field', level: 5, name: 'B', pic: 'X(2)' },
    ]);
  });

  it('copybook_info describes the server', async () => {
    const { data } = await callJson('copybook_info', {});
    expect(data).toEqual({
      server: 'copybook-mcp',
      version: '0.1.0',
      ddl_namespace: 'bronze',
      tool_mode: 'standard',
      tools: ['copybook_info', 'copybook_parse', 'copybook_generate_ddl', 'copybook_interpret_pic'],
    });
  });

  it('unknown tools produce an INVALID_PARAMS error', async () => {
    const { isError, data } = await callJson('copybook_nope', {});
    expect(isError).toBe(true);
    expect(data.error).toEqual({ code: 'INVALID_PARAMS', message: 'Unknown tool: copybook_nope' });
  });
});
