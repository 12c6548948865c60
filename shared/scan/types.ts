import reasonCatalog from "./reasons.json";

export type ScanStatus = "ok" | "error" | "missing" | "shelf_error";

export type DiscrepancyStatus = Exclude<ScanStatus, "ok">;

export type ReasonOption = {
  value: string;
  label: string;
  sub?: Array<{ value: string; label: string }>;
  detail?: string;
};

export type ReasonSelection = {
  value: string;
  sub?: string;
  detail?: string;
  otherText?: string;
};

export type ScanPayload = {
  badge: string;
  place_cod: number;
  fact_qty: number | null;
  status: ScanStatus;
  discrepancy_reason: string | null;
  comment: string | null;
  photo: string | null;
  photos: string[];
};

export type ScanDraft = {
  badge: string;
  placeId: number | null | undefined;
  status: ScanStatus | null | undefined;
  reason?: ReasonSelection | null;
  comment?: string | null;
  factQty?: number | null;
  quickScan?: boolean;
};

export type ScanAck = {
  success: boolean;
  result?: Record<string, unknown>;
};

export const REASONS_BY_STATUS: Record<DiscrepancyStatus, ReasonOption[]> = reasonCatalog;

const STATUS_ALIASES = new Map<string, ScanStatus>([
  ["ok", "ok"],
  ["match", "ok"],
  ["error", "error"],
  ["discrepancy", "error"],
  ["missing", "missing"],
  ["shelf_error", "shelf_error"],
  ["broken", "shelf_error"],
]);

export function toScanStatus(value: unknown): ScanStatus | null {
  if (typeof value !== "string") {
    return null;
  }
  return STATUS_ALIASES.get(value.trim().toLowerCase()) ?? null;
}

export function isScanAck(value: unknown): value is ScanAck {
  return !!value && typeof value === "object" && "success" in value && typeof value.success === "boolean";
}

export function findReason(status: ScanStatus, value: string): ReasonOption | null {
  if (status === "ok") {
    return null;
  }
  return REASONS_BY_STATUS[status].find((option) => option.value === value) ?? null;
}
