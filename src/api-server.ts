#!/usr/bin/env node
import 'reflect-metadata';
import { runServer } from './api/server.js';
import { getBootstrapLogger } from './core/logging/index.js';

runServer().catch((error: unknown) => {
  getBootstrapLogger().fatal({ err: error }, 'Fatal error running server');
  process.exit(1);
});
