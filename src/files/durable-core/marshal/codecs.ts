import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

export type MarshalError =
  | { readonly code: 'MARSHAL_PARSE_ERROR'; readonly message: string }
  | { readonly code: 'MARSHAL_SHAPE_ERROR'; readonly message: string }
  | { readonly code: 'MARSHAL_ENCODE_ERROR'; readonly message: string };

export type CodecShape = 'list' | 'int_map' | 'string_map' | 'object';

/**
 * Explicit serialization schema for one persisted shape.
 *
 * `encode` checks the value against the same schema `decode` enforces and
 * produces a plain value for `JSON.stringify`, so nothing is written that
 * cannot be read back. `decode` takes the output of `JSON.parse` and proves it
 * has the expected shape.
 */
export interface BlobCodec<T> {
  readonly shape: CodecShape;
  encode(value: T): Result<unknown, MarshalError>;
  decode(raw: unknown): Result<T, MarshalError>;
}

const CANONICAL_INT_KEY = /^-?(0|[1-9][0-9]*)$/;

function issueText(error: z.ZodError): string {
  const first = error.errors[0];
  const where = first && first.path.length ? ` at ${first.path.join('.')}` : '';
  return `${where}: ${first?.message ?? 'invalid'}`;
}

function shapeError(shape: CodecShape, error: z.ZodError): MarshalError {
  return { code: 'MARSHAL_SHAPE_ERROR', message: `Stored value does not match ${shape}${issueText(error)}` };
}

function encodeError(shape: CodecShape, error: z.ZodError): MarshalError {
  return { code: 'MARSHAL_ENCODE_ERROR', message: `Value does not match ${shape}${issueText(error)}` };
}

function checked(shape: CodecShape, schema: z.ZodTypeAny, plain: unknown): Result<unknown, MarshalError> {
  const parsed = schema.safeParse(plain);
  return parsed.success ? ok(plain) : err(encodeError(shape, parsed.error));
}

export function listCodec<S extends z.ZodTypeAny>(item: S): BlobCodec<readonly z.output<S>[]> {
  const schema = z.array(item);
  return {
    shape: 'list',
    encode: (value) => checked('list', schema, value),
    decode: (raw) => {
      const parsed = schema.safeParse(raw);
      return parsed.success ? ok(parsed.data) : err(shapeError('list', parsed.error));
    },
  };
}

/**
 * Map with integer keys. JSON object keys are strings, so keys are written in
 * decimal and must read back as canonical safe integers.
 */
export function intKeyedMapCodec<S extends z.ZodTypeAny>(value: S): BlobCodec<ReadonlyMap<number, z.output<S>>> {
  const schema = z.record(z.string(), value);
  return {
    shape: 'int_map',
    encode: (map) => {
      for (const k of map.keys()) {
        if (!Number.isSafeInteger(k)) {
          return err({ code: 'MARSHAL_ENCODE_ERROR', message: `Map key is not an integer: ${String(k)}` });
        }
      }
      const plain = Object.fromEntries(Array.from(map, ([k, v]): [string, z.output<S>] => [String(k), v]));
      return checked('int_map', schema, plain);
    },
    decode: (raw) => {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) return err(shapeError('int_map', parsed.error));

      const entries: [number, z.output<S>][] = [];
      for (const [key, v] of Object.entries(parsed.data)) {
        const n = Number(key);
        if (!CANONICAL_INT_KEY.test(key) || !Number.isSafeInteger(n)) {
          return err({ code: 'MARSHAL_SHAPE_ERROR', message: `Map key is not an integer: ${JSON.stringify(key)}` });
        }
        entries.push([n, v]);
      }
      return ok(new Map(entries));
    },
  };
}

export function stringKeyedMapCodec<S extends z.ZodTypeAny>(value: S): BlobCodec<ReadonlyMap<string, z.output<S>>> {
  const schema = z.record(z.string(), value);
  return {
    shape: 'string_map',
    encode: (map) => {
      const plain = Object.fromEntries(map);
      return checked('string_map', schema, plain);
    },
    decode: (raw) => {
      const parsed = schema.safeParse(raw);
      return parsed.success ? ok(new Map(Object.entries(parsed.data))) : err(shapeError('string_map', parsed.error));
    },
  };
}

export function objectCodec<S extends z.ZodTypeAny>(schema: S): BlobCodec<z.output<S>> {
  return {
    shape: 'object',
    encode: (value) => checked('object', schema, value),
    decode: (raw) => {
      const parsed = schema.safeParse(raw);
      return parsed.success ? ok(parsed.data) : err(shapeError('object', parsed.error));
    },
  };
}
