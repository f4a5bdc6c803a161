import type { ConnectionStateValue } from "./types";

export class ConnectionState {
  private current: ConnectionStateValue = "OPEN";
  private configuredOnce = false;

  get value(): ConnectionStateValue {
    return this.current;
  }

  /** True once an explicit config message has been applied. */
  get configured(): boolean {
    return this.configuredOnce;
  }

  get closed(): boolean {
    return this.current === "CLOSED";
  }

  toConfigured() {
    this.current = "CONFIGURED";
    this.configuredOnce = true;
  }

  toStreaming() {
    this.current = "STREAMING";
  }

  toClosed() {
    this.current = "CLOSED";
  }
}
