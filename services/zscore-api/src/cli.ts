#!/usr/bin/env node
import pino from 'pino';
import { ZScoreRequest } from '@zscore/schemas';
import { buildService } from './app';
import { loadConfig } from './config';
import { ZScoreError } from './errors';
import { createLogger } from './logger';

async function main() {
  const [, , ...rest] = process.argv;
  const args = ZScoreRequest.safeParse({ company: rest.join(' ') });
  if (!args.success) {
    console.error('Usage: npm run cli -- <ticker or company name>');
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  // stdout carries the result; logs go to stderr
  const log = createLogger(config.LOG_LEVEL, pino.destination(2));
  const service = buildService(config, log);

  try {
    const response = await service.evaluate(args.data.company);
    console.log(JSON.stringify(response, null, 2));
  } catch (err) {
    if (!(err instanceof ZScoreError)) throw err;
    console.error(JSON.stringify(err.toResponse(), null, 2));
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
