import type { Notification, TransportKey } from "@hookrelay/shared";
import type { Transport } from "./transport.js";

export type WriteTarget = { write(chunk: string): unknown };

/** Prints one line per notification, e.g. to stderr during development. */
export class WriterTransport implements Transport {
  constructor(
    private readonly out: WriteTarget,
    readonly key: TransportKey = "writer"
  ) {}

  async push(notification: Notification, _signal: AbortSignal): Promise<void> {
    void _signal;
    const { id, type } = notification.context;
    this.out.write(
      `notification: id=${id} type=${type}, to=${notification.recipient.toString()}, message=${notification.render(this.key)}\n`
    );
  }
}
