#!/usr/bin/env node
import 'dotenv/config';

import { main } from './cli.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('main');

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    log.fatal({ err }, 'Unhandled error');
    process.exitCode = 1;
  });
