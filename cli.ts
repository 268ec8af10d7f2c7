#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs } from './server/cli_args.js';
import { loadSettings } from './server/config.js';
import { formatReport, formatSnapshot } from './server/format.js';
import { ProbeRuntime } from './server/runtime.js';

async function main(): Promise<void> {
  const request = parseCliArgs(process.argv.slice(2));
  const runtime = new ProbeRuntime({ settings: loadSettings() });

  const handle = await runtime.start(request);
  runtime.subscribe(handle, (snapshot) => {
    console.log(formatSnapshot(snapshot));
  });

  process.once('SIGINT', () => {
    console.log('\n[cli] stopping...');
    runtime.stop(handle);
  });

  const report = await runtime.awaitCompletion(handle);
  console.log(formatReport(report));
  if (report.endState === 'failed') {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('[CLI FATAL]', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
