import pino from "pino";
import { describe, expect, it } from "vitest";
import { ValidationError } from "../../core/entities/appError";
import { InMemorySignalRepository } from "../../infra/memory/inMemoryMemoryStore";
import { SignalIntakeService } from "./signalIntakeService";

const now = new Date("2026-03-02T09:00:00.000Z");

const createService = () => {
  const signals = new InMemorySignalRepository();
  let counter = 0;
  const service = new SignalIntakeService(
    signals,
    { now: () => now },
    { next: () => `sig-${++counter}` },
    pino({ level: "silent" }),
  );
  return { service, signals };
};

describe("SignalIntakeService", () => {
  it("stores an unprocessed signal with a normalized subject", async () => {
    const { service, signals } = createService();

    const signal = await service.record({
      type: "promoter_buy",
      subject: " acme ",
      payload: { priority: 7 },
    });

    expect(signal).toEqual({
      id: "sig-1",
      discoveredAt: now,
      type: "promoter_buy",
      subject: "ACME",
      payload: { priority: 7 },
      processed: false,
      resultedInInsight: false,
    });
    expect(await signals.findById("sig-1")).toEqual(signal);
  });

  it("keeps an explicit discovery time", async () => {
    const { service } = createService();
    const discoveredAt = new Date("2026-02-27T15:30:00.000Z");

    const signal = await service.record({
      type: "volume_spike",
      subject: "BETA",
      payload: {},
      discoveredAt,
    });

    expect(signal.discoveredAt).toEqual(discoveredAt);
  });

  it("rejects a blank subject without storing anything", async () => {
    const { service, signals } = createService();

    await expect(
      service.record({ type: "promoter_buy", subject: "  ", payload: {} }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await signals.listUnprocessed(10)).toEqual([]);
  });
});
