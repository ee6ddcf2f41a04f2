import { randomUUID } from "node:crypto";
import type { ClockPort, IdGeneratorPort } from "../../core/ports/outboundPorts";

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Random v4 ids for precompute jobs.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
