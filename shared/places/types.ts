export type PlaceRecord = {
  place_cod: number;
  place_name: string;
  floor?: number | string | null;
  row_num?: number | string | null;
  section?: number | string | null;
  shelf?: number | string | null;
  cell?: number | string | null;
  storage_type?: string | null;
  box_type?: string | null;
  dimensions?: string | null;
  category?: string | null;
  mx_type?: string | null;
  qty_shk?: number | null;
  current_volume?: number | null;
  current_occupancy?: number | null;
  updated_at?: string | null;
  [extra: string]: unknown;
};

const SCAN_PREFIX = /^PLCE\s*(.+)$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function normalizeCacheKey(key: string | number): string {
  return String(key).trim().toUpperCase();
}

/** Scanner labels may carry a `PLCE` prefix in front of the place code. */
export function normalizePlaceCode(raw: unknown): string {
  if (typeof raw !== "string") {
    return "";
  }
  let code = raw.trim();
  const match = code.match(SCAN_PREFIX);
  if (match) {
    code = match[1].trim();
  }
  return code.toUpperCase();
}

export function toPlaceRecord(value: unknown): PlaceRecord | null {
  if (!isRecord(value)) {
    return null;
  }
  const rawId = value.place_cod;
  const id = typeof rawId === "string" && rawId.trim() ? Number(rawId) : rawId;
  if (typeof id !== "number" || !Number.isFinite(id)) {
    return null;
  }
  const name = value.place_name;
  if (typeof name !== "string" || !name.trim()) {
    return null;
  }
  const record: PlaceRecord = { place_cod: id, place_name: name };
  for (const [key, entry] of Object.entries(value)) {
    if (key !== "place_cod" && key !== "place_name" && entry !== undefined) {
      record[key] = entry;
    }
  }
  return record;
}
