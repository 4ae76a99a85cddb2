#!/usr/bin/env node
import { main } from '../cli/rcon';
import { toErrorMessage } from '../utils';

main(process.argv.slice(2)).then(
  (message) => {
    if (message !== null) {
      console.error(message);
      process.exitCode = 1;
    }
  },
  (err: unknown) => {
    console.error(toErrorMessage(err));
    process.exitCode = 1;
  },
);
