const PREFIX = '[zettel]';

let verbose = false;

/**
 * Console logging with the tool prefix.
 *
 * Everything goes to stderr: the MCP server speaks JSON-RPC on stdout and a
 * stray line there would break the protocol.
 */
export const logger = {
  setVerbose(value: boolean): void {
    verbose = value;
  },
  debug(message: string): void {
    if (verbose) console.error(`${PREFIX} ${message}`);
  },
  info(message: string): void {
    console.error(`${PREFIX} ${message}`);
  },
  warn(message: string): void {
    console.warn(`${PREFIX} ${message}`);
  },
  error(message: string): void {
    console.error(`${PREFIX} ${message}`);
  },
};
