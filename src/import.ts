#!/usr/bin/env node
// Uso: node dist/import.js [league] [season]   (defaults: LEAGUE/SEASON o epl/2025)
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
// Al evaluarse, ImportCliModule ya ha cargado .env en process.env (ConfigModule.forRoot)
import { EXIT_FAILURE, ImportCliModule, runImportCommand } from './import/import.cli';

runImportCommand(process.argv.slice(2), process.env, () =>
  NestFactory.createApplicationContext(ImportCliModule, { logger: ['log', 'warn', 'error'] }),
)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    new Logger('ImportCli').error(e instanceof Error ? e.stack : String(e));
    process.exitCode = EXIT_FAILURE;
  });
