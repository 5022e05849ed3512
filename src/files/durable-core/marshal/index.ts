export type { BlobCodec, CodecShape, MarshalError } from './codecs.js';
export { listCodec, intKeyedMapCodec, stringKeyedMapCodec, objectCodec } from './codecs.js';
export { marshal, unmarshal, unmarshalList, unmarshalMap, unmarshalStringMap, unmarshalObject } from './marshal.js';
export type { JsonPrimitive, JsonValue, JsonObject } from './json-types.js';
export { JsonValueSchema, JsonObjectSchema } from './json-types.js';
