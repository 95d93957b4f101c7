import { v5 as uuidv5 } from "uuid";
import type { LinkableRecord } from "./types";

// RFC 4122 name-based namespaces
const NAMESPACE_DNS = "6ba7b810-9dad-11d1-80b4-00c04fd430c8";
const NAMESPACE_URL = "6ba7b811-9dad-11d1-80b4-00c04fd430c8";

/** Base-57 alphabet shared with the discovery front end. No 0, 1, I, O or l. */
export const SHORT_ID_ALPHABET = "23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

// ceil(log57(2^128))
export const SHORT_ID_LENGTH = 22;

/**
 * Encode a UUID as a fixed-length base-57 string, most significant digit
 * first, left-padded with the alphabet's zero digit.
 */
export function encodeShortId(uuid: string): string {
  const hex = uuid.replace(/-/g, "");
  if (!/^[0-9a-f]{32}$/i.test(hex)) {
    throw new Error(`Not a UUID: ${uuid}`);
  }

  const base = BigInt(SHORT_ID_ALPHABET.length);
  let n = BigInt(`0x${hex}`);
  let out = "";
  while (n > 0n) {
    out = SHORT_ID_ALPHABET[Number(n % base)] + out;
    n /= base;
  }
  return out.padStart(SHORT_ID_LENGTH, SHORT_ID_ALPHABET[0]);
}

/** UUIDv5 of a record URI, in the URL namespace for absolute http(s) URIs. */
export function recordUuid(uri: string): string {
  const namespace = /^https?:\/\//i.test(uri) ? NAMESPACE_URL : NAMESPACE_DNS;
  return uuidv5(uri, namespace);
}

/** Stable short identifier used in discovery links. Same URI, same id. */
export function deepLinkId(uri: string): string {
  return encodeShortId(recordUuid(uri));
}

function escapeLinkText(text: string): string {
  return text.replace(/[[\]]/g, (c) => `\\${c}`);
}

/** One markdown link line: [title](base/collections/<id>) */
export function formatRecord(record: LinkableRecord, discoveryBaseUrl: string): string {
  const base = discoveryBaseUrl.replace(/\/+$/, "");
  return `[${escapeLinkText(record.title)}](${base}/collections/${deepLinkId(record.uri)})`;
}

// Teams renders a trailing double space as a line break
export const LINE_SEPARATOR = "   \n";

export function formatSection(
  records: LinkableRecord[],
  discoveryBaseUrl: string,
  placeholder: string
): string {
  if (records.length === 0) return placeholder;
  return records.map((r) => formatRecord(r, discoveryBaseUrl)).join(LINE_SEPARATOR);
}
