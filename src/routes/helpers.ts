import type { OperationResult } from "../types/index.ts";
import { unwrapResult } from "../middleware/error-handler.ts";

export interface SuccessBody {
  success: true;
  message: string;
  warnings?: string[];
}

/** Maps a failed result to its HTTP error; a degraded success carries its warnings. */
export function successBody(result: OperationResult, message: string): SuccessBody {
  const warnings = unwrapResult(result);
  return warnings.length > 0 ? { success: true, message, warnings } : { success: true, message };
}
