#!/usr/bin/env node
import { ServiceConfig } from './common/Config';
import { CLIParser } from './cli/CLIParser';
import { ApplicationBuilder } from './factory/ServiceFactory';
import { HTTPServer } from './server/HTTPServer';

interface Application {
  httpServer: HTTPServer;
}

function createApplication(config: ServiceConfig): Application {
  const builder = new ApplicationBuilder(config);
  const service = builder.buildService();
  return { httpServer: builder.buildHTTPServer(service) };
}

async function startApplication(app: Application, config: ServiceConfig): Promise<void> {
  await app.httpServer.start();
  printStartupInfo(config);
}

async function shutdownApplication(app: Application): Promise<void> {
  console.log('\nShutting down gracefully...');
  await app.httpServer.stop();
  console.log('Shutdown complete');
}

function printStartupInfo(config: ServiceConfig): void {
  console.log('Scapegoat Set - Ready!');
  console.log(`  Key type: ${config.keyType}`);
  console.log(`  Alpha: ${config.tree.alpha}`);
  console.log(`  HTTP API: http://localhost:${config.httpPort}`);
}

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  const app = createApplication(options.config);

  const shutdown = (): void => {
    shutdownApplication(app)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await startApplication(app, options.config);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
