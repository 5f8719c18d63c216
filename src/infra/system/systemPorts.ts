import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Wall-clock access behind a port; tests pass a fixed clock instead.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
