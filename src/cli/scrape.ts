#!/usr/bin/env node
import 'reflect-metadata';
import minimist from 'minimist';
import { exitCodeFor, main } from './cli';

main(minimist(process.argv.slice(2)))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.exitCode = exitCodeFor(err);
  });
