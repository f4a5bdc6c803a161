import { ConnectionState } from "./ConnectionState";

/**
 * Each handler returns false once the connection is closed; callers drop the
 * message in that case.
 */
export class ConnectionStateMachine {
  constructor(private readonly state: ConnectionState = new ConnectionState()) {}

  get value() {
    return this.state.value;
  }

  get configured() {
    return this.state.configured;
  }

  onConfig(): boolean {
    if (this.state.closed) return false;
    this.state.toConfigured();
    return true;
  }

  onAudio(): boolean {
    if (this.state.closed) return false;
    this.state.toStreaming();
    return true;
  }

  onEof(): boolean {
    return !this.state.closed;
  }

  /** Returns false when the connection was already closed. */
  onClose(): boolean {
    if (this.state.closed) return false;
    this.state.toClosed();
    return true;
  }
}
