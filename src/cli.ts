#!/usr/bin/env node
import { consoleProbeIO, runProbe } from './probe/probe.js';

process.exitCode = await runProbe(process.argv.slice(2), consoleProbeIO);
