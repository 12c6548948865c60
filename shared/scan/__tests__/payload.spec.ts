import { describe, expect, it } from "vitest";

import { buildScanPayload, composeDiscrepancyReason } from "../payload";
import { isScanAck, REASONS_BY_STATUS, toScanStatus, type ScanDraft } from "../types";

const DRAFT: ScanDraft = { badge: " B-100 ", placeId: 17, status: "ok" };

describe("composeDiscrepancyReason", () => {
  it("appends the chosen sub-option", () => {
    expect(composeDiscrepancyReason("error", { value: "no_rack", sub: "obstacle" })).toBe("No rack - obstacle");
    expect(composeDiscrepancyReason("error", { value: "no_rack" })).toBe("No rack");
  });

  it("appends free-text detail where the option asks for it", () => {
    expect(composeDiscrepancyReason("missing", { value: "no_container", detail: " BX-77 " })).toBe(
      "No container - BX-77",
    );
    expect(composeDiscrepancyReason("shelf_error", { value: "box_broken", detail: "ignored" })).toBe("Box broken");
  });

  it("uses the typed text for other", () => {
    expect(composeDiscrepancyReason("missing", { value: "other", otherText: " shelf removed " })).toBe("shelf removed");
    expect(composeDiscrepancyReason("missing", { value: "other", otherText: "  " })).toBe("Other");
  });

  it("returns null for values outside the catalog", () => {
    expect(composeDiscrepancyReason("missing", { value: "no_rack" })).toBeNull();
  });
});

describe("buildScanPayload", () => {
  it("builds a match without a reason", () => {
    expect(buildScanPayload({ ...DRAFT, comment: "  ", factQty: 4 })).toEqual({
      ok: true,
      payload: {
        badge: "B-100",
        place_cod: 17,
        fact_qty: 4,
        status: "ok",
        discrepancy_reason: null,
        comment: null,
        photo: null,
        photos: [],
      },
    });
  });

  it("carries the first photo separately and all photos in order", () => {
    const result = buildScanPayload(
      { ...DRAFT, status: "missing", reason: { value: "no_box", sub: "n_boxes" }, comment: " left side " },
      ["data:image/jpeg;base64,AAA", "data:image/jpeg;base64,BBB"],
    );
    expect(result).toMatchObject({
      ok: true,
      payload: {
        status: "missing",
        discrepancy_reason: "No box - N boxes",
        comment: "left side",
        photo: "data:image/jpeg;base64,AAA",
        photos: ["data:image/jpeg;base64,AAA", "data:image/jpeg;base64,BBB"],
      },
    });
  });

  it.each([
    [{ ...DRAFT, badge: " " }, "missing-badge"],
    [{ ...DRAFT, placeId: null }, "missing-place"],
    [{ ...DRAFT, status: null }, "missing-status"],
    [{ ...DRAFT, status: "shelf_error" as const }, "missing-reason"],
    [{ ...DRAFT, status: "error" as const, reason: { value: "no_box" } }, "unknown-reason"],
  ])("rejects incomplete drafts (%#)", (draft, issue) => {
    expect(buildScanPayload(draft)).toMatchObject({ ok: false, issue });
  });

  it("skips the reason for quick-scan matches and discrepancies only", () => {
    expect(buildScanPayload({ ...DRAFT, status: "error", quickScan: true })).toMatchObject({
      ok: true,
      payload: { status: "error", discrepancy_reason: null },
    });
    expect(buildScanPayload({ ...DRAFT, status: "missing", quickScan: true })).toMatchObject({
      ok: false,
      issue: "missing-reason",
    });
  });
});

describe("scan status catalog", () => {
  it("maps legacy names onto statuses", () => {
    expect(toScanStatus("match")).toBe("ok");
    expect(toScanStatus(" Discrepancy ")).toBe("error");
    expect(toScanStatus("broken")).toBe("shelf_error");
    expect(toScanStatus("constructor")).toBeNull();
  });

  it("recognizes server acknowledgements", () => {
    expect(isScanAck({ success: true, result: { id: 1 } })).toBe(true);
    expect(isScanAck({ success: false })).toBe(true);
    expect(isScanAck({ success: "yes" })).toBe(false);
    expect(isScanAck("ok")).toBe(false);
    expect(isScanAck(null)).toBe(false);
  });

  it("offers an other option for every discrepancy status", () => {
    for (const options of Object.values(REASONS_BY_STATUS)) {
      expect(options.some((option) => option.value === "other")).toBe(true);
    }
  });
});
