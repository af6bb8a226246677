import type { FailureKind, OperationResult } from "../types/index.ts";

export function succeeded(...warnings: string[]): OperationResult {
  return { ok: true, warnings };
}

export function failed(kind: FailureKind, error: string): OperationResult {
  return { ok: false, kind, error };
}
