import { connect, isIP } from 'node:net';
import { SetupError, TransientIOError } from '../errors.js';
import type { RunConfig } from '../target.js';
import type { IProbeChannel, IProbeTransport } from '../worker.js';

/**
 * A connect probe: success means the TCP handshake completed within the
 * attempt timeout. The socket is closed right away and nothing is written.
 */
export class TcpConnectChannel implements IProbeChannel {
  private readonly inFlight = new Set<() => void>();

  constructor(
    private readonly address: string,
    private readonly port: number,
    private readonly timeoutMs: number,
  ) {}

  public attempt(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(new TransientIOError('ABORTED', 'Attempt aborted before connecting'));
        return;
      }

      const socket = connect({ host: this.address, port: this.port });
      let settled = false;

      const finish = (error: TransientIOError | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        this.inFlight.delete(onAbort);
        socket.destroy();
        if (error) {
          reject(error);
          return;
        }
        resolve();
      };

      const onAbort = (): void => {
        finish(new TransientIOError('ABORTED', 'Attempt aborted'));
      };

      const timer = setTimeout(() => {
        finish(new TransientIOError('ETIMEDOUT', `Connect timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      signal.addEventListener('abort', onAbort, { once: true });
      this.inFlight.add(onAbort);

      socket.once('connect', () => finish(null));
      socket.on('error', (error: NodeJS.ErrnoException) => {
        finish(new TransientIOError(error.code ?? 'EIO', error.message));
      });
    });
  }

  public async close(): Promise<void> {
    for (const abort of [...this.inFlight]) {
      abort();
    }
  }
}

export class TcpConnectTransport implements IProbeTransport {
  public async open(config: RunConfig): Promise<IProbeChannel> {
    if (isIP(config.address) === 0) {
      throw new SetupError(`Cannot open a TCP channel to non-IP address "${config.address}"`);
    }
    return new TcpConnectChannel(config.address, config.port, config.attemptTimeoutMs);
  }
}
