import { randomUUID } from "node:crypto";
import type {
  ClockPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";

/**
 * Wall-clock boundary; tests substitute a fixed clock so run timestamps and TTLs are reproducible.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Issues run, signal and insight ids.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
