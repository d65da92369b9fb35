#!/usr/bin/env node
import { cli } from './cli.js';
import { clearPluginCache } from './lib/plugin-client.js';

try {
  await cli.parseAsync(process.argv);
} finally {
  clearPluginCache();
}
