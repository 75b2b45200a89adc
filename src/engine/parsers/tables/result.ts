/**
 * Result shape shared by all table decoders
 */

export type ParseStatus = "complete" | "partial" | "not_implemented" | "error";

export interface ParseResult {
  parsed: unknown;
  status: ParseStatus;
  error?: string;
}

export function result(parsed: unknown, status: ParseStatus): ParseResult {
  return { parsed, status };
}

export function failed(error: unknown): ParseResult {
  return {
    parsed: null,
    status: "error",
    error: error instanceof Error ? error.message : String(error),
  };
}

export function tooShort(tag: string, length: number, needed: number): ParseResult {
  return failed(new Error(`${tag} table too short (${length} bytes, need ${needed})`));
}
