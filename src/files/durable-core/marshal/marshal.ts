import type { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { BlobCodec, MarshalError } from './codecs.js';
import { listCodec, intKeyedMapCodec, stringKeyedMapCodec, objectCodec } from './codecs.js';

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Serialize a value to JSON text through its codec.
 *
 * Fails (as data) for values the codec's schema rejects, and for values JSON
 * cannot represent: cycles, BigInt, or a top-level `undefined`/function.
 */
export function marshal<T>(codec: BlobCodec<T>, value: T): Result<string, MarshalError> {
  const plain = codec.encode(value);
  if (plain.isErr()) return err(plain.error);

  let text: string | undefined;
  try {
    text = JSON.stringify(plain.value);
  } catch (e) {
    return err({ code: 'MARSHAL_ENCODE_ERROR', message: `Value cannot be serialized: ${describe(e)}` });
  }
  if (text === undefined) {
    return err({ code: 'MARSHAL_ENCODE_ERROR', message: 'Value has no JSON representation' });
  }
  return ok(text);
}

export function unmarshal<T>(codec: BlobCodec<T>, text: string): Result<T, MarshalError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return err({ code: 'MARSHAL_PARSE_ERROR', message: `Stored text is not valid JSON: ${describe(e)}` });
  }
  return codec.decode(raw);
}

export function unmarshalList<S extends z.ZodTypeAny>(
  item: S,
  text: string
): Result<readonly z.output<S>[], MarshalError> {
  return unmarshal(listCodec(item), text);
}

export function unmarshalMap<S extends z.ZodTypeAny>(
  value: S,
  text: string
): Result<ReadonlyMap<number, z.output<S>>, MarshalError> {
  return unmarshal(intKeyedMapCodec(value), text);
}

export function unmarshalStringMap<S extends z.ZodTypeAny>(
  value: S,
  text: string
): Result<ReadonlyMap<string, z.output<S>>, MarshalError> {
  return unmarshal(stringKeyedMapCodec(value), text);
}

export function unmarshalObject<S extends z.ZodTypeAny>(schema: S, text: string): Result<z.output<S>, MarshalError> {
  return unmarshal(objectCodec(schema), text);
}
