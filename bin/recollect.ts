#!/usr/bin/env node
import { loadConfig, type EngineConfig } from '../config.js';
import { createProgram, defaultContext } from '../src/cli.js';
import { createLogger } from '../src/logger.js';

function main(argv: string[]): void {
  let config: EngineConfig;
  try {
    config = loadConfig();
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: config.logLevel });
  createProgram(defaultContext(config, logger)).parse(argv);
}

main(process.argv);
