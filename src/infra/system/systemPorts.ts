import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type {
  ClockPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";

/**
 * Wall-clock time and real waits; tests swap in a fake clock.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }

  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await delay(ms);
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
