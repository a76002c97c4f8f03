#!/usr/bin/env node
import { ArgumentError, parseArgs, usage } from './args.js';
import { renderCommand } from './commands.js';
import { readVersion } from './version.js';

async function run(){
  const [,,...argv] = process.argv;
  if (argv.length === 0) { console.log(usage()); return; }

  const cmd = parseArgs(argv);
  if (cmd.kind === 'help') { console.log(usage()); return; }
  if (cmd.kind === 'version') { console.log(readVersion()); return; }

  renderCommand(cmd.options, {
    log: message => console.log(message),
    stderr: process.stderr,
    now: () => new Date()
  });
}

run().catch(e => {
  const message = e instanceof Error ? e.message : String(e);
  console.error(`error: ${message}`);
  if (e instanceof ArgumentError) console.error(`Run "sierpinski --help" for usage.`);
  process.exit(1);
});
