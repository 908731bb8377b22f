export const FRAME_HEADER_BYTES = 4;
export const DEFAULT_MAX_FRAME_BYTES = 10_000_000;
export const UNCORRELATED_REQ_ID = -1;

export type JsonObject = Record<string, unknown>;

export interface RuntimeRequestEnvelope {
  cmd: string;
  req_id: number;
  payload: JsonObject;
}

export interface RuntimeResponseEnvelope {
  ok: boolean;
  req_id: number;
  payload: JsonObject;
  error: string;
}

export class FramingError extends Error {
  readonly declaredLength: number;

  constructor(message: string, declaredLength: number) {
    super(message);
    this.name = 'FramingError';
    this.declaredLength = declaredLength;
  }
}

/**
 * One decoded unit from the byte stream. A body that is not JSON still
 * consumes its frame so the stream stays aligned on the next header.
 */
export type DecodedFrame =
  | {
      kind: 'message';
      message: unknown;
    }
  | {
      kind: 'invalid-json';
      error: string;
    };

interface ConsumedFrames {
  frames: DecodedFrame[];
  remainder: Buffer;
  error: FramingError | null;
}

export function encodeFrame(message: RuntimeRequestEnvelope | RuntimeResponseEnvelope): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32LE(body.length, 0);
  return Buffer.concat([header, body]);
}

function decodeFrameBody(body: Buffer): DecodedFrame {
  try {
    return {
      kind: 'message',
      message: JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(body)) as unknown,
    };
  } catch (error: unknown) {
    return {
      kind: 'invalid-json',
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Extracts every complete frame from `buffer`. Frames after an invalid
 * length header are never decoded: the stream cannot be resynchronized.
 */
export function consumeFrames(
  buffer: Buffer,
  maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES,
): ConsumedFrames {
  const frames: DecodedFrame[] = [];
  let offset = 0;

  while (buffer.length - offset >= FRAME_HEADER_BYTES) {
    const declaredLength = buffer.readUInt32LE(offset);
    if (declaredLength === 0 || declaredLength > maxFrameBytes) {
      return {
        frames,
        remainder: Buffer.alloc(0),
        error: new FramingError(`Invalid length: ${String(declaredLength)}`, declaredLength),
      };
    }
    const bodyStart = offset + FRAME_HEADER_BYTES;
    if (buffer.length - bodyStart < declaredLength) {
      break;
    }
    frames.push(decodeFrameBody(buffer.subarray(bodyStart, bodyStart + declaredLength)));
    offset = bodyStart + declaredLength;
  }

  return {
    frames,
    remainder: offset === 0 ? buffer : Buffer.from(buffer.subarray(offset)),
    error: null,
  };
}

export function asRecord(value: unknown): JsonObject | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return value as JsonObject;
}

// Integers past 2^53 have already lost precision in JSON.parse and could not be echoed back.
function readReqId(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : null;
}

export type ParsedRequestEnvelope =
  | {
      ok: true;
      envelope: RuntimeRequestEnvelope;
    }
  | {
      ok: false;
      reqId: number;
      error: string;
    };

export function parseRequestEnvelope(value: unknown): ParsedRequestEnvelope {
  const record = asRecord(value);
  if (record === null) {
    return {
      ok: false,
      reqId: UNCORRELATED_REQ_ID,
      error: 'Invalid message schema',
    };
  }

  const cmd = record['cmd'];
  const reqId = readReqId(record['req_id']);
  const rawPayload = record['payload'];
  const payload = rawPayload === undefined || rawPayload === null ? {} : asRecord(rawPayload);

  if (typeof cmd !== 'string' || reqId === null || payload === null) {
    return {
      ok: false,
      reqId: reqId ?? UNCORRELATED_REQ_ID,
      error: 'Invalid message schema',
    };
  }

  return {
    ok: true,
    envelope: {
      cmd,
      req_id: reqId,
      payload,
    },
  };
}

export function parseResponseEnvelope(value: unknown): RuntimeResponseEnvelope | null {
  const record = asRecord(value);
  if (record === null) {
    return null;
  }
  const ok = record['ok'];
  const reqId = readReqId(record['req_id']);
  const payload = asRecord(record['payload']);
  const error = record['error'];
  if (typeof ok !== 'boolean' || reqId === null || payload === null || typeof error !== 'string') {
    return null;
  }
  return {
    ok,
    req_id: reqId,
    payload,
    error,
  };
}

export function okResponse(reqId: number, payload: JsonObject): RuntimeResponseEnvelope {
  return {
    ok: true,
    req_id: reqId,
    payload,
    error: '',
  };
}

export function errorResponse(reqId: number, error: string): RuntimeResponseEnvelope {
  return {
    ok: false,
    req_id: reqId,
    payload: {},
    error,
  };
}
