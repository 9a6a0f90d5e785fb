/**
 * Payload Codec
 *
 * Tier-2 envelope: one marker byte followed by the payload.
 *   0x00  UTF-8 JSON
 *   0x01  zlib-deflated UTF-8 JSON
 */

import * as zlib from 'zlib';
import { promisify } from 'util';
import { performance } from 'perf_hooks';
import { CacheDataError } from '../errors/index.js';
import { getErrorMessage, toError } from '../utils/errors.js';

const deflate = promisify(zlib.deflate);
const inflate = promisify(zlib.inflate);

export const MARKER_RAW = 0x00;
export const MARKER_DEFLATE = 0x01;

export type CacheEntry = Record<string, unknown>;

export interface CodecOptions {
  /** Payloads larger than this many bytes are compressed */
  compressionThreshold: number;
  compressionLevel: number;
}

export interface EncodedPayload {
  envelope: Buffer;
  compressed: boolean;
  /** Serialized JSON size in bytes, before compression */
  originalSize: number;
  /** Payload size in bytes, excluding the marker */
  payloadSize: number;
  /** Milliseconds spent compressing; 0 when stored raw */
  compressionTime: number;
}

export async function encodePayload(entry: CacheEntry, options: CodecOptions): Promise<EncodedPayload> {
  const json = Buffer.from(JSON.stringify(entry), 'utf8');

  if (json.length <= options.compressionThreshold) {
    return {
      envelope: Buffer.concat([Buffer.from([MARKER_RAW]), json]),
      compressed: false,
      originalSize: json.length,
      payloadSize: json.length,
      compressionTime: 0,
    };
  }

  const start = performance.now();
  const deflated = await deflate(json, { level: options.compressionLevel });
  const compressionTime = performance.now() - start;

  return {
    envelope: Buffer.concat([Buffer.from([MARKER_DEFLATE]), deflated]),
    compressed: true,
    originalSize: json.length,
    payloadSize: deflated.length,
    compressionTime,
  };
}

/**
 * Decode an envelope back into an entry.
 *
 * @throws CacheDataError on an unknown marker, a corrupt deflate stream,
 * invalid JSON, or a payload that is not a JSON object
 */
export async function decodePayload(envelope: Buffer): Promise<CacheEntry> {
  if (envelope.length === 0) {
    throw new CacheDataError('Empty cache payload');
  }

  const marker = envelope[0];
  const body = envelope.subarray(1);
  let json: Buffer;

  switch (marker) {
    case MARKER_RAW:
      json = body;
      break;
    case MARKER_DEFLATE:
      try {
        json = await inflate(body);
      } catch (error) {
        throw new CacheDataError(`Failed to decompress cache payload: ${getErrorMessage(error)}`, {
          cause: toError(error),
        });
      }
      break;
    default:
      throw new CacheDataError(`Unknown cache payload marker 0x${marker.toString(16).padStart(2, '0')}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json.toString('utf8'));
  } catch (error) {
    throw new CacheDataError(`Failed to parse cache payload: ${getErrorMessage(error)}`, {
      cause: toError(error),
    });
  }

  if (!isCacheEntry(parsed)) {
    throw new CacheDataError('Cache payload is not a JSON object');
  }
  return parsed;
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
