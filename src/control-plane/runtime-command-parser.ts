import { z } from 'zod';
import type { JsonObject } from './frame-protocol.ts';
import {
  plainObjectSchema,
  projectBundlePayloadSchema,
  type ProjectBundlePayload,
} from '../runtime/project-bundle.ts';
import { CommandError, type RuntimeCommandName } from '../runtime/runtime-state.ts';

interface PingCommand {
  cmd: 'PING';
}

interface GetStatusCommand {
  cmd: 'GET_STATUS';
}

interface StartCommand {
  cmd: 'START';
}

interface StopCommand {
  cmd: 'STOP';
}

interface GetDiagCommand {
  cmd: 'GET_DIAG';
}

interface ReadVarsCommand {
  cmd: 'READ_VARS';
  names: string[];
}

interface SetVarsCommand {
  cmd: 'SET_VARS';
  values: Record<string, unknown>;
}

interface ForceSetCommand {
  cmd: 'FORCE_SET';
  ownerId: string;
  values: Record<string, unknown>;
}

interface ForceClearCommand {
  cmd: 'FORCE_CLEAR';
  ownerId: string;
  names: string[] | null;
  all: boolean;
}

interface GetForcesCommand {
  cmd: 'GET_FORCES';
}

interface LoadProjectCommand {
  cmd: 'LOAD_PROJECT';
  bundle: ProjectBundlePayload;
}

interface ShutdownCommand {
  cmd: 'SHUTDOWN';
}

export type RuntimeCommand =
  | PingCommand
  | GetStatusCommand
  | StartCommand
  | StopCommand
  | GetDiagCommand
  | ReadVarsCommand
  | SetVarsCommand
  | ForceSetCommand
  | ForceClearCommand
  | GetForcesCommand
  | LoadProjectCommand
  | ShutdownCommand;

type CommandParser = (payload: JsonObject) => RuntimeCommand;

export type RuntimeCommandParserRegistry = Readonly<Record<RuntimeCommandName, CommandParser>>;

const NAMES_MESSAGE = 'payload.names must be array of strings';
const VALUES_MESSAGE = 'payload.values must be object';
const OWNER_ID_MESSAGE = 'payload.owner_id required';

const namesSchema = z.array(z.string({ invalid_type_error: NAMES_MESSAGE }), {
  required_error: NAMES_MESSAGE,
  invalid_type_error: NAMES_MESSAGE,
});

const valuesSchema = plainObjectSchema(VALUES_MESSAGE);

const ownerIdSchema = z
  .string({
    required_error: OWNER_ID_MESSAGE,
    invalid_type_error: OWNER_ID_MESSAGE,
  })
  .min(1, OWNER_ID_MESSAGE);

const readVarsSchema = z.object({
  names: namesSchema.default([]),
});

const setVarsSchema = z.object({
  values: valuesSchema.default({}),
});

const forceSetSchema = z.object({
  owner_id: ownerIdSchema,
  values: valuesSchema.default({}),
});

const forceClearSchema = z.object({
  owner_id: ownerIdSchema,
  names: namesSchema.nullish(),
  all: z.boolean({ invalid_type_error: 'payload.all must be boolean' }).default(false),
});

function parseWith<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  payload: JsonObject,
): z.output<TSchema> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new CommandError(result.error.issues[0]?.message ?? 'Invalid payload');
  }
  return result.data;
}

export const DEFAULT_RUNTIME_COMMAND_PARSERS: RuntimeCommandParserRegistry = {
  PING: () => ({ cmd: 'PING' }),
  GET_STATUS: () => ({ cmd: 'GET_STATUS' }),
  START: () => ({ cmd: 'START' }),
  STOP: () => ({ cmd: 'STOP' }),
  GET_DIAG: () => ({ cmd: 'GET_DIAG' }),
  READ_VARS: (payload) => ({
    cmd: 'READ_VARS',
    names: parseWith(readVarsSchema, payload).names,
  }),
  SET_VARS: (payload) => ({
    cmd: 'SET_VARS',
    values: parseWith(setVarsSchema, payload).values,
  }),
  FORCE_SET: (payload) => {
    const parsed = parseWith(forceSetSchema, payload);
    return {
      cmd: 'FORCE_SET',
      ownerId: parsed.owner_id,
      values: parsed.values,
    };
  },
  FORCE_CLEAR: (payload) => {
    const parsed = parseWith(forceClearSchema, payload);
    return {
      cmd: 'FORCE_CLEAR',
      ownerId: parsed.owner_id,
      names: parsed.names ?? null,
      all: parsed.all,
    };
  },
  GET_FORCES: () => ({ cmd: 'GET_FORCES' }),
  LOAD_PROJECT: (payload) => ({
    cmd: 'LOAD_PROJECT',
    bundle: parseWith(projectBundlePayloadSchema, payload),
  }),
  SHUTDOWN: () => ({ cmd: 'SHUTDOWN' }),
};

function isRuntimeCommandName(
  value: string,
  parsers: RuntimeCommandParserRegistry,
): value is RuntimeCommandName {
  return Object.prototype.hasOwnProperty.call(parsers, value);
}

/**
 * Resolves `cmd` by exact name and validates its payload. Throws
 * `CommandError` with the message the peer receives.
 */
export function parseRuntimeCommand(
  cmd: string,
  payload: JsonObject,
  parsers: RuntimeCommandParserRegistry = DEFAULT_RUNTIME_COMMAND_PARSERS,
): RuntimeCommand {
  if (!isRuntimeCommandName(cmd, parsers)) {
    throw new CommandError(`Unknown cmd: ${cmd}`);
  }
  return parsers[cmd](payload);
}
