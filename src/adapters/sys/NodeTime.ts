import type { TimePort } from "../../ports/sys/TimePort";

export class NodeTime implements TimePort {
  constructor(private readonly locale?: string) {}

  now(): number {
    return Date.now();
  }

  toLocaleTimeString(epochMs: number): string {
    return new Date(epochMs).toLocaleTimeString(this.locale);
  }
}
