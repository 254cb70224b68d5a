import net from 'node:net';

export type Socks5Stub = {
  port: number;
  /** `host:port` of every CONNECT the stub accepted. */
  connects: string[];
  close(): Promise<void>;
};

const REPLY_OK = Buffer.from([5, 0, 0, 1, 0, 0, 0, 0, 0, 0]);
const REPLY_REFUSED = Buffer.from([5, 5, 0, 1, 0, 0, 0, 0, 0, 0]);

/** Minimal no-auth SOCKS5 CONNECT server on 127.0.0.1 for tests. */
export function startSocks5Stub(): Promise<Socks5Stub> {
  const connects: string[] = [];
  const sockets = new Set<net.Socket>();

  const server = net.createServer((client) => {
    sockets.add(client);
    client.on('close', () => sockets.delete(client));
    client.on('error', () => client.destroy());

    client.once('data', () => {
      client.write(Buffer.from([5, 0]));
      client.once('data', (req) => {
        let host: string;
        let offset: number;
        if (req[3] === 1) {
          host = Array.from(req.subarray(4, 8)).join('.');
          offset = 8;
        } else if (req[3] === 3) {
          const len = req[4];
          host = req.subarray(5, 5 + len).toString();
          offset = 5 + len;
        } else {
          client.end(REPLY_REFUSED);
          return;
        }
        const port = req.readUInt16BE(offset);
        connects.push(`${host}:${port}`);

        const upstream = net.connect({ host, port }, () => {
          client.write(REPLY_OK);
          upstream.pipe(client);
          client.pipe(upstream);
        });
        sockets.add(upstream);
        upstream.on('close', () => sockets.delete(upstream));
        upstream.on('error', () => client.end(REPLY_REFUSED));
      });
    });
  });

  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      resolve({
        port,
        connects,
        close: () =>
          new Promise<void>((done) => {
            for (const s of sockets) s.destroy();
            server.close(() => done());
          }),
      });
    });
  });
}
