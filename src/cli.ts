#!/usr/bin/env node
import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { parseArgs } from 'util';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CliModule } from './cli/cli.module';
import { FifoFileService } from './cli/fifo-file.service';
import { FifoOptions, parseCostBasis, parseOutOfOrderPolicy } from './config/app.config';

dotenv.config();

const USAGE = 'Usage: fifo-lots <trades.csv> [--out-dir dir] [--policy skip|warn] [--cost-basis price|amount]';

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'out-dir': { type: 'string', short: 'o' },
      policy: { type: 'string' },
      'cost-basis': { type: 'string' },
    },
  });

  const [inputPath] = positionals;
  if (!inputPath) {
    Logger.error(USAGE, undefined, 'CLI');
    return 1;
  }

  const overrides: Partial<FifoOptions> = {};
  if (values.policy) {
    overrides.outOfOrderPolicy = parseOutOfOrderPolicy(values.policy);
  }
  if (values['cost-basis']) {
    overrides.costBasis = parseCostBasis(values['cost-basis']);
  }

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    await app.get(FifoFileService).run(inputPath, values['out-dir'] ?? process.cwd(), overrides);
    return 0;
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    Logger.error(err instanceof Error ? err.message : String(err), undefined, 'CLI');
    process.exitCode = 1;
  });
