/**
 * In-memory SessionTransport for unit tests
 */

import type { DisconnectReason, SessionTransport } from '../../src/types.js';

export class FakeTransport implements SessionTransport {
  readonly sent: string[] = [];
  closedWith: { reason: DisconnectReason; notice?: string } | null = null;
  /** When set, every send fails */
  failSends = false;
  /** When set, every send throws */
  throwOnSend = false;

  send(line: string): boolean {
    if (this.throwOnSend) throw new Error('socket exploded');
    if (this.failSends || this.closedWith) return false;
    this.sent.push(line);
    return true;
  }

  close(reason: DisconnectReason, notice?: string): void {
    if (this.closedWith) return;
    this.closedWith = notice === undefined ? { reason } : { reason, notice };
  }

  /** Sent frames without their trailing newline */
  get lines(): string[] {
    return this.sent.map((frame) => frame.replace(/\n$/, ''));
  }

  get lastLine(): string | undefined {
    return this.lines[this.lines.length - 1];
  }

  clear(): void {
    this.sent.length = 0;
  }
}
