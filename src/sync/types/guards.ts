import type { SyncStatus } from "@/sync/ledger/types";
import { SOURCE_TYPES, type SourceType } from "./index";

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((t) => t === value);
}

export function isSyncStatus(value: string): value is SyncStatus {
  return value === "SUCCESS" || value === "FAILED";
}
