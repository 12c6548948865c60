import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  __resetReliabilityEventsForTests,
  emitReliabilityEvent,
  recentReliabilityEvents,
  subscribeReliabilityEvents,
} from "../events";

describe("reliability events", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-03-01T10:00:00Z"));
    __resetReliabilityEventsForTests();
  });

  afterEach(() => {
    vi.useRealTimers();
    __resetReliabilityEventsForTests();
  });

  it("delivers events to subscribers until they unsubscribe", () => {
    const listener = vi.fn();
    const unsubscribe = subscribeReliabilityEvents(listener);
    emitReliabilityEvent({ type: "cache:hit", timestamp: Date.now(), key: "A1" });
    unsubscribe();
    emitReliabilityEvent({ type: "cache:hit", timestamp: Date.now(), key: "A2" });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ type: "cache:hit", timestamp: Date.now(), key: "A1" });
  });

  it("ignores listener failures", () => {
    const healthy = vi.fn();
    subscribeReliabilityEvents(() => {
      throw new Error("listener down");
    });
    subscribeReliabilityEvents(healthy);
    emitReliabilityEvent({ type: "network:state", timestamp: Date.now(), online: false });
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it("returns events inside the requested window", () => {
    const start = Date.now();
    emitReliabilityEvent({ type: "photo:rejected", timestamp: start, reason: "old" });
    vi.setSystemTime(start + 10 * 60_000);
    emitReliabilityEvent({ type: "photo:rejected", timestamp: Date.now(), reason: "new" });

    const recent = recentReliabilityEvents(5 * 60_000);
    expect(recent).toHaveLength(1);
    expect(recent[0]).toMatchObject({ reason: "new" });
    expect(recentReliabilityEvents(60 * 60_000)).toHaveLength(2);
  });

  it("keeps history when an event carries a clock running ahead", () => {
    emitReliabilityEvent({ type: "photo:rejected", timestamp: Date.now(), reason: "now" });
    emitReliabilityEvent({ type: "cache:hit", timestamp: Date.now() + 2 * 60 * 60_000, key: "A1" });

    expect(recentReliabilityEvents(60_000)).toEqual([
      expect.objectContaining({ type: "photo:rejected", reason: "now" }),
      expect.objectContaining({ type: "cache:hit", key: "A1" }),
    ]);
  });

  it("forgets events older than an hour", () => {
    const start = Date.now();
    emitReliabilityEvent({ type: "photo:rejected", timestamp: start, reason: "stale" });
    vi.setSystemTime(start + 61 * 60_000);
    expect(recentReliabilityEvents(2 * 60 * 60_000)).toEqual([]);
  });
});
