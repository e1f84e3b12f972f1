#!/usr/bin/env node
import 'dotenv/config';
import { run, reportFailure } from './run';

run(process.argv.slice(2)).catch((err) => reportFailure(err));
