#!/usr/bin/env node
import { program } from './index.js';
import { exitWithError } from './context.js';

program.parseAsync(process.argv).catch(exitWithError);
