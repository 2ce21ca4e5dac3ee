import { z, toJSONSchema } from 'zod';

export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = toJSONSchema(schema, {
    target: 'draft-7',
    io: 'input',
    reused: 'inline',
    unrepresentable: 'any',
  });

  // MCP wants the bare object schema, without draft metadata.
  const { $schema: _schema, $defs: _defs, ['~standard']: _standard, ...normalized } = jsonSchema;

  const type = normalized.type;
  if (type === undefined) {
    return { ...normalized, type: 'object' };
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }

  return normalized;
}
