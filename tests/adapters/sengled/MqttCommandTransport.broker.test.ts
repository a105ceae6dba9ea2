import http from 'http';
import net from 'net';
import { MqttCommandTransport } from '../../../src/adapters/sengled/MqttCommandTransport';
import { TransportError } from '../../../src/domain/errors';
import { RecordingLogger } from '../../helpers/RecordingLogger';

// Real mqtt client against local servers that never complete a session.

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') resolve(address.port);
      else reject(new Error('server has no port'));
    });
  });
}

function stop(server: net.Server, sockets: Set<net.Socket>): Promise<void> {
  for (const socket of sockets) socket.destroy();
  return new Promise((resolve) => server.close(() => resolve()));
}

function trackSockets(server: net.Server): Set<net.Socket> {
  const sockets = new Set<net.Socket>();
  server.on('connection', (socket: net.Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  return sockets;
}

describe('MqttCommandTransport against a local server', () => {
  test('a refused WebSocket upgrade rejects with TransportError', async () => {
    const server = http.createServer((_req, res) => {
      res.writeHead(404).end();
    });
    server.on('upgrade', (_req, socket) => {
      socket.end('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\nContent-Length: 0\r\n\r\n');
    });
    const sockets = trackSockets(server);
    const port = await listen(server);
    const brokerUrl = `ws://127.0.0.1:${port}/mqtt`;

    try {
      const outcome = MqttCommandTransport.open('test-token', {
        brokerUrl,
        connectTimeoutMs: 1000,
        logger: new RecordingLogger(),
      });
      await expect(outcome).rejects.toBeInstanceOf(TransportError);
      await expect(outcome).rejects.toThrow(`MQTT connect to ${brokerUrl} failed:`);
    } finally {
      await stop(server, sockets);
    }
  });

  test('a broker that never sends connack rejects after the connect timeout', async () => {
    const server = net.createServer(() => {
      // accept and stay silent
    });
    const sockets = trackSockets(server);
    const port = await listen(server);
    const brokerUrl = `mqtt://127.0.0.1:${port}`;

    try {
      const startedAt = Date.now();
      const outcome = MqttCommandTransport.open('test-token', {
        brokerUrl,
        connectTimeoutMs: 300,
        logger: new RecordingLogger(),
      });
      await expect(outcome).rejects.toBeInstanceOf(TransportError);
      expect(Date.now() - startedAt).toBeLessThan(4000);
    } finally {
      await stop(server, sockets);
    }
  });
});
