import { once } from 'node:events';
import net from 'node:net';

/** Loopback socket pair: `server` is the accepted side, `client` the connecting side. */
export async function socketPair(): Promise<{ server: net.Socket; client: net.Socket }> {
  const listener = net.createServer();
  listener.listen(0, '127.0.0.1');
  await once(listener, 'listening');
  const address = listener.address();
  if (address === null || typeof address === 'string') throw new Error('No port assigned');

  const accepted = once(listener, 'connection');
  const client = net.connect({ host: '127.0.0.1', port: address.port });
  const [server] = await accepted;
  listener.close();
  if (!(server instanceof net.Socket)) throw new Error('Expected a socket');
  return { server, client };
}

/** Raw HTTP client that records everything the peer sends. */
export class Client {
  private received = '';
  private readonly waiters = new Set<() => void>();
  private readonly ended: Promise<void>;

  private constructor(private readonly socket: net.Socket) {
    socket.setEncoding('latin1');
    socket.on('data', (chunk: string) => {
      this.received += chunk;
      this.notify();
    });
    this.ended = new Promise((resolve) => {
      socket.on('close', () => {
        this.notify();
        resolve();
      });
    });
  }

  static async connect(port: number, host = '127.0.0.1'): Promise<Client> {
    const socket = net.connect({ host, port });
    await once(socket, 'connect');
    return new Client(socket);
  }

  static wrap(socket: net.Socket): Client {
    return new Client(socket);
  }

  get text(): string {
    return this.received;
  }

  send(text: string): void {
    this.socket.write(text, 'latin1');
  }

  /** Sends `text` and ends the writing side, leaving the socket open for the reply. */
  end(text: string): void {
    this.socket.end(text, 'latin1');
  }

  /** Resolves with everything received once `text` has been seen. */
  async until(text: string): Promise<string> {
    while (!this.received.includes(text)) {
      if (this.socket.destroyed) throw new Error(`Closed before receiving ${JSON.stringify(text)}`);
      await new Promise<void>((resolve) => this.waiters.add(resolve));
    }
    return this.received;
  }

  /** Resolves with everything received once the peer has closed. */
  async closed(): Promise<string> {
    await this.ended;
    return this.received;
  }

  destroy(): void {
    this.socket.destroy();
  }

  private notify(): void {
    for (const waiter of this.waiters) waiter();
    this.waiters.clear();
  }
}
