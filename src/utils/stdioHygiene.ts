/**
 * stdout belongs to the MCP JSON-RPC stream and to `ddl` command output.
 * Anything logged through console.log/info/debug goes to stderr instead.
 */

function writeToStderr(...args: unknown[]): void {
  console.error(...args);
}

for (const method of ['log', 'info', 'debug'] as const) {
  if (console[method] !== writeToStderr) console[method] = writeToStderr;
}
