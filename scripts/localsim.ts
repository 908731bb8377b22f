import { handle, type Command } from '@oclif/core';
import commands from './localsim-commands.ts';

const registry = new Map<string, Command.Class>(Object.entries(commands));

function printRootHelp(): void {
  const width = Math.max(...[...registry.keys()].map((name) => name.length));
  const lines = ['Usage: localsim <command> [options]', '', 'Commands:'];
  for (const [name, commandClass] of registry) {
    lines.push(`  ${name.padEnd(width)}  ${commandClass.summary ?? ''}`);
  }
  lines.push('', 'Run `localsim <command> --help` for command options.');
  process.stdout.write(`${lines.join('\n')}\n`);
}

async function main(argv: readonly string[]): Promise<number> {
  const [name, ...rest] = argv;
  if (name === undefined || name === '--help' || name === '-h' || name === 'help') {
    printRootHelp();
    return 0;
  }
  const commandClass = registry.get(name);
  if (commandClass === undefined) {
    process.stderr.write(`unknown command: ${name}\n`);
    printRootHelp();
    return 2;
  }
  await commandClass.run(rest, import.meta.url);
  return 0;
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (error: unknown) {
  await handle(error instanceof Error ? error : new Error(String(error)));
}
