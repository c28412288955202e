import { Command, InvalidArgumentError } from 'commander';
import { API_VERSION } from './server';

export interface ICliOptions {
  host?: string;
  port?: number;
  envFile: string;
}

function parsePort(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Port must be a number.');
  }
  const port = Number.parseInt(value, 10);
  if (port > 65535) {
    throw new InvalidArgumentError('Port must be between 0 and 65535.');
  }
  return port;
}

/**
 * Build the command-line parser for the API server
 */
export function createCli(): Command {
  return new Command('domain-batch-query')
    .description('Start the bulk domain query HTTP service')
    .version(API_VERSION)
    .option('--host <host>', 'listen address (default: 127.0.0.1)')
    .option('--port <port>', 'listen port (default: 8000)', parsePort)
    .option('--env-file <path>', 'env file loaded before reading configuration', '.env');
}

/**
 * Parse process arguments
 * @param argv - Full argv, including the node binary and script path
 */
export function parseCliOptions(argv: readonly string[], command: Command = createCli()): ICliOptions {
  command.parse([...argv]);
  const options = command.opts<{ host?: string; port?: number; envFile: string }>();
  return {
    envFile: options.envFile,
    ...(options.host !== undefined && { host: options.host }),
    ...(options.port !== undefined && { port: options.port })
  };
}
