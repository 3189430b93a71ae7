/**
 * TCP liveness probe
 */

import * as net from "node:net";

export interface PortProbe {
  isListening(port: number): Promise<boolean>;
}

/**
 * A port counts as up when a TCP connect succeeds.
 */
export class TcpPortProbe implements PortProbe {
  constructor(
    private readonly host: string = "localhost",
    private readonly timeoutMs: number = 1000,
  ) {}

  isListening(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = net.createConnection({ host: this.host, port });

      const finish = (open: boolean) => {
        socket.removeAllListeners();
        socket.destroy();
        resolve(open);
      };

      socket.setTimeout(this.timeoutMs);
      socket.once("connect", () => finish(true));
      socket.once("timeout", () => finish(false));
      socket.once("error", () => finish(false));
    });
  }
}
