#!/usr/bin/env node
import { MainApp } from './MainApp';

const mainApp = new MainApp();

mainApp
  .run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Failed to run release-preview', error);
    process.exitCode = 1;
  });
