#!/usr/bin/env node

import path from 'path';
import { ApiServer } from './server';
import { parseCliOptions } from './cli';
import { StaticFiles } from './StaticFiles';
import { loadEnvFile, resolveServerConfig } from '../config/ServerConfig';
import { DomainQueryController } from '../controllers/DomainQueryController';
import { DomainQueryEngine } from '../services/DomainQueryEngine';
import { JsonFileSuffixSource } from '../services/SuffixSource';
import { WhoisLookupClient } from '../services/WhoisLookupClient';
import { AxiosWhoisTransport } from '../services/AxiosWhoisTransport';

/**
 * Entry point for the bulk domain query API server
 */
async function main(): Promise<void> {
  const cli = parseCliOptions(process.argv);
  loadEnvFile(path.resolve(cli.envFile));
  const config = resolveServerConfig(process.env, cli);

  console.log('🚀 Starting domain query API server...');
  console.log(`📄 Suffix config: ${config.suffixConfigPath}`);
  console.log(`🌐 Whois endpoint: ${config.whoisEndpoint}`);

  const client = new WhoisLookupClient(config.clientPolicy, new AxiosWhoisTransport(config.whoisEndpoint));
  const engine = new DomainQueryEngine(new JsonFileSuffixSource(config.suffixConfigPath), client);
  const server = new ApiServer({
    host: config.host,
    port: config.port,
    controller: new DomainQueryController(engine),
    staticFiles: new StaticFiles(config.staticDir)
  });

  const shutdown = (signal: string): void => {
    console.log(`\n🛑 Received ${signal}, shutting down gracefully...`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Error during shutdown:', error);
        process.exit(1);
      }
    );
  };

  // Graceful shutdown handling
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await server.start();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`❌ Failed to start API server: ${reason}. Try a higher port, e.g. --port 8080.`);
    process.exit(1);
  }
}

// Start the server
main().catch((error: unknown) => {
  console.error('❌ Unhandled error:', error);
  process.exit(1);
});
