import * as zlib from 'node:zlib';
import registerDebug from 'debug';
import { Segment } from './types.js';
import { BODY_DATA_FORMAT, ContainerFormat } from './format.js';

const debug = registerDebug('wordhoard:segments');

/**
 * Shape returned by zlib's sync API when called with `info: true`.
 * @types/node only declares the plain Buffer return, so the result is
 * narrowed at runtime instead.
 */
interface InflateInfo {
  buffer: Buffer;
  engine: { bytesWritten: number };
}

function isInflateInfo(value: unknown): value is InflateInfo {
  if (typeof value !== 'object' || value === null) return false;
  if (!('buffer' in value) || !Buffer.isBuffer(value.buffer)) return false;
  if (!('engine' in value) || typeof value.engine !== 'object' || value.engine === null) return false;
  return 'bytesWritten' in value.engine && typeof value.engine.bytesWritten === 'number';
}

/**
 * Try to inflate a zlib stream starting at `offset`.
 *
 * Sync-flush is used instead of finish so a stream cut short by the end of the
 * buffer yields what it decoded rather than failing. Returns null when the
 * bytes at `offset` are not the start of a stream.
 */
export function decompressAt(
  bytes: Uint8Array,
  offset: number
): { payload: Buffer; consumed: number } | null {
  if (offset < 0 || offset >= bytes.length) return null;

  let result: unknown;
  try {
    result = zlib.inflateSync(bytes.subarray(offset), {
      info: true,
      finishFlush: zlib.constants.Z_SYNC_FLUSH
    });
  } catch {
    return null;
  }

  if (!isInflateInfo(result)) {
    throw new Error('zlib did not report consumed input; unsupported Node.js version');
  }
  return { payload: result.buffer, consumed: result.engine.bytesWritten };
}

/**
 * Walk a container left to right, yielding every segment that decompresses.
 *
 * The cursor starts after the fixed header. At each position a decode is
 * attempted: success moves the cursor past exactly the consumed bytes, failure
 * moves it by one byte. Iteration ends when the buffer is exhausted, or earlier
 * if the consumer stops pulling.
 */
export function* readSegments(
  bytes: Uint8Array,
  format: ContainerFormat = BODY_DATA_FORMAT
): Generator<Segment, void, undefined> {
  let cursor = format.headerSize;
  let skipped = 0;

  while (cursor < bytes.length) {
    const attempt = decompressAt(bytes, cursor);

    if (!attempt) {
      cursor += 1;
      skipped += 1;
      continue;
    }

    const offset = cursor;
    // A decoder that consumed nothing would never advance
    cursor += Math.max(attempt.consumed, 1);

    if (skipped > 0) {
      debug('skipped %d padding bytes before offset %d', skipped, offset);
      skipped = 0;
    }

    if (attempt.payload.length === 0) {
      continue;
    }

    yield { offset, payload: attempt.payload, consumed: attempt.consumed };
  }
}
