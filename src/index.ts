#!/usr/bin/env node

/**
 * reqclarity - MCP Server Entry Point
 *
 * Grades software requirements as Clear, Partially Clear or Unclear, and
 * explains why.
 */

import { ReqClarityServer } from './server.js';

async function main(): Promise<void> {
  const server = new ReqClarityServer();
  serverInstance = server;

  const shutdown = (): void => {
    console.error('Shutting down reqclarity...');
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };

  // Handle graceful shutdown
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Start the server
  await server.start();
}

// Track server instance for cleanup on fatal errors
let serverInstance: ReqClarityServer | null = null;

main().catch(async (error: unknown) => {
  console.error('Fatal error:', error);

  // Close the database before exiting
  if (serverInstance) {
    try {
      await serverInstance.stop();
    } catch (cleanupError) {
      console.error('Error during cleanup:', cleanupError);
    }
  }

  process.exit(1);
});
