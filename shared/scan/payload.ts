import { findReason, toScanStatus, type ReasonSelection, type ScanDraft, type ScanPayload, type ScanStatus } from "./types";

export type PayloadIssue =
  | "missing-badge"
  | "missing-place"
  | "missing-status"
  | "missing-reason"
  | "unknown-reason";

export type PayloadResult =
  | { ok: true; payload: ScanPayload }
  | { ok: false; issue: PayloadIssue; message: string };

const OTHER_REASON = "other";
const OTHER_LABEL = "Other";

function trimmed(value: string | null | undefined): string {
  return typeof value === "string" ? value.trim() : "";
}

/** Renders a reason selection as the text stored with the scan result. */
export function composeDiscrepancyReason(
  status: ScanStatus,
  selection: ReasonSelection,
): string | null {
  if (selection.value === OTHER_REASON) {
    return trimmed(selection.otherText) || OTHER_LABEL;
  }
  const option = findReason(status, selection.value);
  if (!option) {
    return null;
  }
  if (option.sub?.length) {
    const sub = option.sub.find((entry) => entry.value === selection.sub);
    return sub ? `${option.label} - ${sub.label}` : option.label;
  }
  const detail = trimmed(selection.detail);
  if (option.detail && detail) {
    return `${option.label} - ${detail}`;
  }
  return option.label;
}

function fail(issue: PayloadIssue, message: string): PayloadResult {
  return { ok: false, issue, message };
}

export function buildScanPayload(draft: ScanDraft, photos: string[] = []): PayloadResult {
  const badge = trimmed(draft.badge);
  if (!badge) {
    return fail("missing-badge", "Badge is required");
  }
  if (typeof draft.placeId !== "number" || !Number.isFinite(draft.placeId)) {
    return fail("missing-place", "Scan a place first");
  }
  const status = toScanStatus(draft.status);
  if (!status) {
    return fail("missing-status", "Choose a result status");
  }

  // quick-scan mode records match/discrepancy with a single tap
  const skipReason = Boolean(draft.quickScan) && (status === "ok" || status === "error");
  let discrepancyReason: string | null = null;
  if (!skipReason) {
    const selection = draft.reason;
    if (selection && selection.value) {
      discrepancyReason = composeDiscrepancyReason(status, selection);
      if (discrepancyReason === null && status !== "ok") {
        return fail("unknown-reason", `Unknown reason "${selection.value}" for status ${status}`);
      }
    } else if (status !== "ok") {
      return fail("missing-reason", "Choose a discrepancy reason");
    }
  }

  return {
    ok: true,
    payload: {
      badge,
      place_cod: draft.placeId,
      fact_qty:
        typeof draft.factQty === "number" && Number.isFinite(draft.factQty) ? draft.factQty : null,
      status,
      discrepancy_reason: discrepancyReason,
      comment: trimmed(draft.comment) || null,
      photo: photos[0] ?? null,
      photos: photos.slice(),
    },
  };
}
