import { Args, Command, Flags } from '@oclif/core';
import {
  parseAssignments,
  readBundleFile,
  resolveControlTarget,
  runControlCommand,
  type ControlTarget,
} from '../src/cli/control.ts';
import { runServe } from '../src/cli/serve.ts';
import { LOG_LEVELS, parseLogLevel } from '../src/log/log-core.ts';
import type { RuntimeCommandName } from '../src/runtime/runtime-state.ts';

const hostFlag = Flags.string({
  description: 'Runtime host (defaults to config, then LOCALSIM_HOST, then 127.0.0.1).',
});

const portFlag = Flags.integer({
  description: 'Runtime TCP port (defaults to config, then LOCALSIM_PORT, then 1963).',
  min: 0,
  max: 65535,
});

const configFlag = Flags.string({
  description: 'Path to a localsim.config.jsonc file.',
});

const connectionFlags = {
  help: Flags.help({ char: 'h' }),
  host: hostFlag,
  port: portFlag,
  config: configFlag,
};

abstract class LocalSimCommandBase extends Command {
  protected exitIfNeeded(code: number): void {
    if (code !== 0) {
      this.exit(code);
    }
  }

  protected target(flags: { host?: string; port?: number; config?: string }): ControlTarget {
    return resolveControlTarget({
      ...(flags.host === undefined ? {} : { host: flags.host }),
      ...(flags.port === undefined ? {} : { port: flags.port }),
      ...(flags.config === undefined ? {} : { configPath: flags.config }),
    });
  }
}

class ServeCommand extends LocalSimCommandBase {
  static override summary = 'Run the runtime server in the foreground.';

  static override usage = [
    'serve [--host <host>] [--port <port>] [--log <level>] [--log-file <path>] [--config <path>]',
  ];

  static override flags = {
    help: Flags.help({ char: 'h' }),
    host: hostFlag,
    port: portFlag,
    config: configFlag,
    log: Flags.string({
      description: 'Minimum log level.',
      options: [...LOG_LEVELS],
    }),
    'log-file': Flags.string({
      description: 'Append JSONL log records to this file.',
    }),
  };

  override async run(): Promise<void> {
    const { flags } = await this.parse(ServeCommand);
    const logLevel = parseLogLevel(flags.log);
    const code = await runServe({
      ...(flags.host === undefined ? {} : { host: flags.host }),
      ...(flags.port === undefined ? {} : { port: flags.port }),
      ...(flags.config === undefined ? {} : { configPath: flags.config }),
      ...(logLevel === null ? {} : { logLevel }),
      ...(flags['log-file'] === undefined ? {} : { logFile: flags['log-file'] }),
    });
    this.exitIfNeeded(code);
  }
}

function simpleCommand(cmd: RuntimeCommandName, summary: string): Command.Class {
  return class SimpleCommand extends LocalSimCommandBase {
    static override summary = summary;

    static override flags = connectionFlags;

    override async run(): Promise<void> {
      const { flags } = await this.parse(SimpleCommand);
      const code = await runControlCommand(this.target(flags), cmd);
      this.exitIfNeeded(code);
    }
  };
}

class ReadCommand extends LocalSimCommandBase {
  static override summary = 'Read variables (forced values win over stored ones).';

  static override usage = ['read <name...> [--host <host>] [--port <port>]'];

  static override strict = false;

  static override flags = connectionFlags;

  override async run(): Promise<void> {
    const { flags, argv } = await this.parse(ReadCommand);
    const names = argv.filter((value): value is string => typeof value === 'string');
    const code = await runControlCommand(this.target(flags), 'READ_VARS', { names });
    this.exitIfNeeded(code);
  }
}

class SetCommand extends LocalSimCommandBase {
  static override summary = 'Store variable values; values that parse as JSON keep their type.';

  static override usage = ['set <name=value...> [--host <host>] [--port <port>]'];

  static override strict = false;

  static override flags = connectionFlags;

  override async run(): Promise<void> {
    const { flags, argv } = await this.parse(SetCommand);
    const assignments = argv.filter((value): value is string => typeof value === 'string');
    if (assignments.length === 0) {
      this.error('missing name=value assignments', { exit: 2 });
    }
    const code = await runControlCommand(this.target(flags), 'SET_VARS', {
      values: parseAssignments(assignments),
    });
    this.exitIfNeeded(code);
  }
}

class LoadCommand extends LocalSimCommandBase {
  static override summary = 'Send a project bundle JSON file with LOAD_PROJECT.';

  static override usage = ['load <bundle.json> [--host <host>] [--port <port>]'];

  static override args = {
    bundle: Args.string({
      description: 'Path to a JSON file holding the project bundle.',
      required: true,
    }),
  };

  static override flags = connectionFlags;

  override async run(): Promise<void> {
    const { args, flags } = await this.parse(LoadCommand);
    const code = await runControlCommand(
      this.target(flags),
      'LOAD_PROJECT',
      readBundleFile(args.bundle),
    );
    this.exitIfNeeded(code);
  }
}

const commands = {
  serve: ServeCommand,
  ping: simpleCommand('PING', 'Check liveness and list runtime capabilities.'),
  status: simpleCommand('GET_STATUS', 'Show lifecycle state and the loaded project summary.'),
  start: simpleCommand('START', 'Enter RUN (requires a loaded project).'),
  stop: simpleCommand('STOP', 'Enter STOP.'),
  diag: simpleCommand('GET_DIAG', 'Show runtime diagnostics.'),
  forces: simpleCommand('GET_FORCES', 'List active force overrides.'),
  shutdown: simpleCommand('SHUTDOWN', 'Ask the runtime to stop accepting connections.'),
  read: ReadCommand,
  set: SetCommand,
  load: LoadCommand,
} satisfies Record<string, Command.Class>;

export default commands;
