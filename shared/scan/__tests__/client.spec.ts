import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createMemoryStorage } from "../../core/pstore";
import type { PhotoDecoder } from "../../media/compress";
import { createStubHttp, requestBody, type Route } from "../../net/__tests__/helpers";
import { __resetReliabilityEventsForTests } from "../../reliability/events";
import { setLogLevel, setLogSink, type LogEntry } from "../../telemetry/logger";
import { createScanClient } from "../client";
import type { ScanDraft } from "../types";

const PLACE = { place_cod: 17, place_name: "A-1", shelf: 3 };
const PHOTO_URL = "data:image/jpeg;base64,AQID";

const decoder: PhotoDecoder = {
  measure: async () => ({ width: 100, height: 50 }),
  draw: async (_input, size) => ({
    ...size,
    mimeType: "image/jpeg",
    encode: async () => new Uint8Array([1, 2, 3]),
  }),
};

const server: Route = (config) => {
  if (config.method === "get" && config.url?.startsWith("/api/place/")) {
    return { status: 200, data: PLACE };
  }
  if (config.method === "get" && config.url === "/api/health") {
    return { status: 200, data: { ok: true } };
  }
  return { status: 200, data: { success: true, result: { id: 1 } } };
};

function setup(route: Route = server, initialOnline = true) {
  const { http, adapter } = createStubHttp(route);
  const target = new EventTarget();
  const client = createScanClient({
    storage: createMemoryStorage(),
    http,
    decoder,
    events: target,
    initialOnline,
  });
  return { client, adapter, target };
}

const draft: ScanDraft = {
  badge: "B-100",
  placeId: 17,
  status: "missing",
  reason: { value: "no_container", detail: "BX-1" },
};

describe("ScanClient", () => {
  beforeEach(() => {
    __resetReliabilityEventsForTests();
    setLogSink(() => undefined);
  });

  afterEach(() => {
    setLogSink(null);
    setLogLevel(null);
    __resetReliabilityEventsForTests();
  });

  it("normalizes scanned codes and serves repeats from the cache", async () => {
    const { client, adapter } = setup();

    expect(await client.lookupPlace(" plce a-1 ")).toEqual({ status: "ok", data: PLACE, fromCache: false });
    expect(await client.lookupPlace("A-1")).toEqual({ status: "ok", data: PLACE, fromCache: true });
    expect(await client.lookupPlace("17")).toEqual({ status: "ok", data: PLACE, fromCache: true });
    expect(adapter).toHaveBeenCalledTimes(1);
    expect(adapter.mock.calls[0][0].url).toBe("/api/place/A-1");
  });

  it("ignores blank scans", async () => {
    const { client, adapter } = setup();
    expect(await client.lookupPlace("   ")).toEqual({ status: "invalid" });
    expect(adapter).not.toHaveBeenCalled();
  });

  it("submits the scan with attached photos and clears them", async () => {
    const { client, adapter } = setup();
    await client.attachPhotos([new Uint8Array([9, 9, 9])]);

    const result = await client.submitScan(draft);

    expect(result).toEqual({ status: "ok", httpStatus: 200, data: { success: true, result: { id: 1 } } });
    const sent = adapter.mock.calls[0][0];
    expect(sent.url).toBe("/api/scan/complete");
    expect(requestBody(sent)).toEqual({
      badge: "B-100",
      place_cod: 17,
      fact_qty: null,
      status: "missing",
      discrepancy_reason: "No container - BX-1",
      comment: null,
      photo: PHOTO_URL,
      photos: [PHOTO_URL],
    });
    expect(client.attachments.getSnapshot().photos).toEqual([]);
  });

  it("waits for photos still being compressed", async () => {
    const { client, adapter } = setup();
    const attaching = client.attachPhotos([new Uint8Array([1])]);

    const result = await client.submitScan(draft);
    await attaching;

    expect(result.status).toBe("ok");
    expect(requestBody(adapter.mock.calls[0][0])).toMatchObject({ photos: [PHOTO_URL] });
  });

  it("treats an unacknowledged save as a rejection and keeps the photos", async () => {
    const { client } = setup(() => ({ status: 200, data: { success: false } }));
    await client.attachPhotos([new Uint8Array([1])]);

    expect(await client.submitScan(draft)).toEqual({
      status: "rejected",
      httpStatus: 200,
      error: "Scan was not saved",
    });
    expect(client.attachments.dataUrls()).toEqual([PHOTO_URL]);
  });

  it("does not send an incomplete draft", async () => {
    const { client, adapter } = setup();

    expect(await client.submitScan({ ...draft, reason: null })).toEqual({
      status: "invalid",
      issue: "missing-reason",
      message: "Choose a discrepancy reason",
    });
    expect(adapter).not.toHaveBeenCalled();
  });

  it("queues while offline and delivers once the host is back online", async () => {
    const { client, adapter, target } = setup(server, false);

    expect(await client.submitScan(draft)).toEqual({ status: "queued", pending: 1, persisted: true });
    expect(adapter).not.toHaveBeenCalled();

    target.dispatchEvent(new Event("online"));
    expect(await client.syncNow()).toEqual([]);

    expect(adapter).toHaveBeenCalledTimes(1);
    expect(adapter.mock.calls[0][0].url).toBe("/api/scan/complete");
    expect(await client.outbox.size()).toBe(0);
  });

  it("stops following the host after dispose", async () => {
    const { client, target } = setup(server, false);
    client.dispose();
    target.dispatchEvent(new Event("online"));
    expect(client.monitor.isOnline()).toBe(false);
  });

  it("applies the configured log level", () => {
    const sink = vi.fn<(entry: LogEntry, line: string) => void>();
    setLogSink(sink);
    const client = createScanClient({
      storage: createMemoryStorage(),
      http: createStubHttp(server).http,
      decoder,
      config: { logLevel: "error" },
    });

    client.monitor.setOnline(false);

    expect(client.monitor.isOnline()).toBe(false);
    expect(sink).not.toHaveBeenCalled();
  });

  it("checks health through the gateway", async () => {
    const { client } = setup(server, false);
    expect(await client.checkHealth()).toBe("online");
    expect(client.monitor.isOnline()).toBe(true);
  });
});
