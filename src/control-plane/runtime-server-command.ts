import type { JsonObject } from './frame-protocol.ts';
import type { RuntimeCommand } from './runtime-command-parser.ts';
import type { LocalSimRuntime } from '../runtime/runtime-state.ts';

interface ExecuteCommandContext {
  readonly runtime: LocalSimRuntime;
}

interface CommandConnection {
  readonly id: string;
}

// Synchronous on purpose: nothing may suspend between reading and mutating shared runtime state.
export function executeRuntimeServerCommand(
  ctx: ExecuteCommandContext,
  connection: CommandConnection,
  command: RuntimeCommand,
): JsonObject {
  const runtime = ctx.runtime;

  if (command.cmd === 'PING') {
    return runtime.ping();
  }

  if (command.cmd === 'GET_STATUS') {
    return { ...runtime.status() };
  }

  if (command.cmd === 'START') {
    return {
      runtime_state: runtime.start(),
    };
  }

  if (command.cmd === 'STOP') {
    return {
      runtime_state: runtime.stop(),
    };
  }

  if (command.cmd === 'GET_DIAG') {
    return runtime.diagnostics();
  }

  if (command.cmd === 'READ_VARS') {
    return {
      values: runtime.readVars(command.names),
    };
  }

  if (command.cmd === 'SET_VARS') {
    return {
      count: runtime.setVars(command.values),
    };
  }

  if (command.cmd === 'FORCE_SET') {
    runtime.forces.set(command.ownerId, connection.id, command.values);
    return {
      owner_id: command.ownerId,
      count: Object.keys(command.values).length,
    };
  }

  if (command.cmd === 'FORCE_CLEAR') {
    runtime.forces.clear(command.ownerId, {
      all: command.all,
      ...(command.names === null ? {} : { names: command.names }),
    });
    return {
      owner_id: command.ownerId,
    };
  }

  if (command.cmd === 'GET_FORCES') {
    return {
      forces: runtime.forces.snapshot(),
    };
  }

  if (command.cmd === 'LOAD_PROJECT') {
    return {
      loaded: true,
      project_info: runtime.loadProject(command.bundle),
    };
  }

  if (command.cmd === 'SHUTDOWN') {
    return {
      shutting_down: true,
    };
  }

  const unsupported: never = command;
  throw new Error(`unsupported command: ${JSON.stringify(unsupported)}`);
}
