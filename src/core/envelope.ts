import { TextDecoder } from "node:util";
import { gunzipSync, gzipSync } from "node:zlib";

import { CorruptedSessionError } from "./errors.js";
import { stableStringify } from "./utils.js";

// The envelope is gzip-compressed UTF-8 JSON with sorted keys and no whitespace.

export function encodeEnvelope(document: object): Buffer {
  return gzipSync(Buffer.from(stableStringify(document), "utf8"));
}

export function decodeEnvelope(data: Uint8Array): unknown {
  let raw: Buffer;
  try {
    raw = gunzipSync(data);
  } catch (err) {
    throw new CorruptedSessionError("Session data is not gzip-compressed", undefined, err);
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(raw);
  } catch (err) {
    throw new CorruptedSessionError("Session data is not valid UTF-8", undefined, err);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CorruptedSessionError("Session data is not valid JSON", undefined, err);
  }
}
