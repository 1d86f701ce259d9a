#!/usr/bin/env node

import { createCli } from './cli';

void createCli().runExit(process.argv.slice(2));
