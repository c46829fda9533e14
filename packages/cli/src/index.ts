#!/usr/bin/env node

import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { buildProgram } from './program';

// Values already in the environment win over .env
dotenv.config();

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
