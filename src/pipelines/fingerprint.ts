import { createHash } from "node:crypto";
import { normalizeWhitespace } from "../utils/text.js";

export interface FingerprintedText {
  normalized: string;
  fingerprint: string;
}

export function fingerprintText(normalized: string): string {
  return createHash("sha256").update(normalized, "utf8").digest("hex");
}

export function fingerprintDocument(extracted: string): FingerprintedText {
  const normalized = normalizeWhitespace(extracted);
  return { normalized, fingerprint: fingerprintText(normalized) };
}
