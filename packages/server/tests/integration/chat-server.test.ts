/**
 * Chat Server Integration Tests
 *
 * Real TCP sessions against a server bound to an ephemeral loopback port.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ChatServer } from '../../src/server/orchestrator.js';
import { loadConfig, mergeConfig } from '../../src/config.js';
import { ErrorCodes, ShutdownError } from '../../src/errors.js';
import { logger } from '../../src/utils/logger.js';
import type { BoundAddress } from '../../src/index.js';
import { TestServerHarness, type TestLineClient } from '../harness/index.js';

async function waitUntil(condition: () => boolean, timeout = 5000): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

async function rename(client: TestLineClient, name: string): Promise<void> {
  client.send(`CMD_USER|${name}`);
  await client.waitForLine((line) => line.endsWith(` is now known as ${name}.`));
}

describe('Chat server', () => {
  let harness: TestServerHarness;

  afterEach(async () => {
    await harness.stop();
  });

  describe('Sessions', () => {
    it('should welcome a client and send the roster', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const a = await harness.connect();
      const welcome = await a.waitForLine((line) => line.startsWith('SRV|Welcome'));
      const roster = await a.waitForLine((line) => line.startsWith('ULIST|'));

      const address = `127.0.0.1:${a.socket.localPort}`;
      expect(welcome).toBe(`SRV|Welcome to the chat, User_${address}!`);
      expect(roster).toBe(`ULIST|User_${address}(${address})`);
    });

    it('should relay chat to every client including the sender', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const a = await harness.join();
      const b = await harness.join();
      await rename(a, 'Alice');

      a.send('MSG|hello everyone');

      expect(await a.waitForLine('MSG|Alice: hello everyone')).toBe('MSG|Alice: hello everyone');
      expect(await b.waitForLine('MSG|Alice: hello everyone')).toBe('MSG|Alice: hello everyone');
    });

    it('should replay history to a newcomer before the welcome', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const a = await harness.join();
      await rename(a, 'Alice');
      a.send('MSG|one');
      a.send('MSG|two');
      await a.waitForLine('MSG|Alice: two');

      const b = await harness.join();

      expect(b.lines.slice(0, 3)).toEqual([
        'MSG|Alice: one',
        'MSG|Alice: two',
        `SRV|Welcome to the chat, User_127.0.0.1:${b.socket.localPort}!`,
      ]);
    });

    it('should refuse a username already in use', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const a = await harness.join();
      const b = await harness.join();
      await rename(a, 'Alice');

      b.send('CMD_USER|Alice');

      expect(await b.waitForLine((line) => line.includes('already taken'))).toBe(
        "SRV|Username 'Alice' is already taken."
      );
    });

    it('should deliver broadcasts to every client in the same order', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const clients = [await harness.join(), await harness.join(), await harness.join()];
      const [a, b] = clients;
      if (!a || !b) throw new Error('clients not joined');

      await rename(a, 'Alice');
      await rename(b, 'Bob');

      for (let i = 0; i < 5; i++) {
        a.send(`MSG|a${i}`);
        b.send(`MSG|b${i}`);
      }

      const received: string[][] = [];
      for (const client of clients) {
        const lines: string[] = [];
        for (let i = 0; i < 10; i++) {
          lines.push(await client.waitForLine((line) => line.startsWith('MSG|')));
        }
        received.push(lines);
      }

      expect(received[1]).toEqual(received[0]);
      expect(received[2]).toEqual(received[0]);
      expect(received[0]?.filter((line) => line.startsWith('MSG|Alice: '))).toEqual([
        'MSG|Alice: a0',
        'MSG|Alice: a1',
        'MSG|Alice: a2',
        'MSG|Alice: a3',
        'MSG|Alice: a4',
      ]);
    });

    it('should announce a client that quits', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const a = await harness.join();
      const b = await harness.join();
      await rename(a, 'Alice');

      a.send('CMD_QUIT|');

      await a.waitForClose();
      expect(await b.waitForLine('SRV|Alice has left the chat.')).toBe('SRV|Alice has left the chat.');
      const event = await harness.waitForEvent((e) => e.type === 'disconnect');
      expect(event).toMatchObject({ type: 'disconnect', username: 'Alice', reason: 'quit' });
    });
  });

  describe('Admission', () => {
    it('should refuse connections past the client limit and admit again after a departure', async () => {
      harness = new TestServerHarness({ configOverrides: { limits: { maxClients: 2 } } });
      await harness.start();

      const a = await harness.join();
      await harness.join();

      const refused = await harness.connect();
      await refused.waitForClose();
      expect(refused.lines).toEqual([]);
      expect(await harness.waitForEvent((e) => e.type === 'reject')).toEqual({
        type: 'reject',
        address: '127.0.0.1',
        reason: 'server_full',
      });

      await a.close();
      await waitUntil(() => harness.instance.chatServer.connectionCount === 1);

      const again = await harness.join();
      expect(again.lines[0]).toBe(`SRV|Welcome to the chat, User_127.0.0.1:${again.socket.localPort}!`);
    });
  });

  describe('Protocol limits', () => {
    it('should disconnect a client that sends an over-long line', async () => {
      harness = new TestServerHarness({ configOverrides: { messages: { maxLineBytes: 64 } } });
      await harness.start();

      const a = await harness.join();
      a.send(`MSG|${'x'.repeat(100)}`);

      expect(await a.waitForLine((line) => line.startsWith('SRV|Message too long'))).toBe(
        'SRV|Message too long. Disconnecting.'
      );
      await a.waitForClose();
      const event = await harness.waitForEvent((e) => e.type === 'disconnect');
      expect(event).toMatchObject({ reason: 'protocol_error' });
    });

    it('should close a silent client after the idle timeout', async () => {
      harness = new TestServerHarness({ configOverrides: { timeouts: { idleMs: 300 } } });
      await harness.start();

      const a = await harness.join();

      await a.waitForClose(3000);
      const event = await harness.waitForEvent((e) => e.type === 'disconnect');
      expect(event).toMatchObject({ reason: 'idle_timeout' });
    });
  });

  describe('Slow consumers', () => {
    it('should drop a client that stops reading while others keep chatting', async () => {
      harness = new TestServerHarness({
        configOverrides: {
          rateLimit: { capacity: 1000, refillPerMinute: 1000 },
          messages: { maxMessageLength: 60_000, maxLineBytes: 65_536 },
          timeouts: { writeMs: 1000 },
        },
      });
      await harness.start();

      const stalled = await harness.join();
      const talker = await harness.join();
      stalled.socket.pause();
      const stalledName = `User_127.0.0.1:${stalled.socket.localPort}`;

      const payload = 'x'.repeat(59_000);
      for (let i = 0; i < 300; i++) {
        talker.send(`MSG|${payload}${i}`);
      }

      const event = await harness.waitForEvent(
        (e) => e.type === 'disconnect' && e.reason === 'write_timeout',
        15_000
      );
      expect(event).toMatchObject({ reason: 'write_timeout', address: `127.0.0.1:${stalled.socket.localPort}` });
      expect(await talker.waitForLine(`SRV|${stalledName} has left the chat.`, 15_000)).toBe(
        `SRV|${stalledName} has left the chat.`
      );
    });
  });

  describe('Shutdown', () => {
    it('should notify and close every client', async () => {
      harness = new TestServerHarness();
      await harness.start();

      const a = await harness.join();
      const b = await harness.join();
      const server = harness.instance.chatServer;

      await harness.instance.shutdown();

      expect(server.state).toBe('STOPPED');
      expect(await a.waitForLine('SRV|Server is shutting down.')).toBe('SRV|Server is shutting down.');
      expect(await b.waitForLine('SRV|Server is shutting down.')).toBe('SRV|Server is shutting down.');
      await a.waitForClose();
      await b.waitForClose();
      expect(b.lines.filter((line) => line.endsWith('has left the chat.'))).toEqual([]);
    });

    it('should force-close a client that never finishes closing', async () => {
      harness = new TestServerHarness({ configOverrides: { timeouts: { shutdownMs: 300 } } });
      await harness.start();
      const logged = vi.spyOn(logger, 'error').mockImplementation(() => {});

      const stubborn = await harness.connect({ allowHalfOpen: true });
      await stubborn.waitForLine((line) => line.startsWith('SRV|Welcome'));
      const polite = await harness.join();
      const server = harness.instance.chatServer;

      try {
        await harness.instance.shutdown();

        expect(server.state).toBe('STOPPED');
        await stubborn.waitForClose();
        await polite.waitForClose();
        const timeouts = harness.events.filter((e) => e.type === 'shutdown_timeout');
        expect(timeouts).toEqual([
          {
            type: 'shutdown_timeout',
            sessionId: expect.any(String),
            address: `127.0.0.1:${stubborn.socket.localPort}`,
          },
        ]);
        const shutdownErrors = logged.mock.calls.filter(([, error]) => error instanceof ShutdownError);
        expect(shutdownErrors).toHaveLength(1);
      } finally {
        logged.mockRestore();
      }
    });

    it('should be safe to call more than once', async () => {
      harness = new TestServerHarness();
      await harness.start();
      const server = harness.instance.chatServer;

      await Promise.all([server.shutdown(), server.shutdown()]);

      expect(server.state).toBe('STOPPED');
    });
  });
});

describe('ChatServer lifecycle', () => {
  function configOn(port: number) {
    return mergeConfig(loadConfig(), {
      network: { host: '127.0.0.1', port },
      admin: { port: null },
    });
  }

  it('should report its bound address through the listening event', async () => {
    const server = new ChatServer(configOn(0), { events: { emit: () => {} } });
    const seen: BoundAddress[] = [];
    server.on('listening', (address: BoundAddress) => seen.push(address));

    const address = await server.start();

    expect(server.state).toBe('LISTENING');
    expect(address.port).toBeGreaterThan(0);
    expect(seen).toEqual([address]);
    await server.shutdown();
  });

  it('should fail to bind a port already in use', async () => {
    const first = new ChatServer(configOn(0), { events: { emit: () => {} } });
    const { port } = await first.start();
    const second = new ChatServer(configOn(port), { events: { emit: () => {} } });

    try {
      await expect(second.start()).rejects.toMatchObject({ code: ErrorCodes.BIND_FAILED });
      expect(second.state).toBe('STOPPED');
    } finally {
      await first.shutdown();
    }
  });

  it('should refuse to start twice', async () => {
    const server = new ChatServer(configOn(0), { events: { emit: () => {} } });
    await server.start();

    try {
      await expect(server.start()).rejects.toMatchObject({ code: ErrorCodes.INVALID_STATE });
    } finally {
      await server.shutdown();
    }
  });

  it('should stop immediately when never started', async () => {
    const server = new ChatServer(configOn(0), { events: { emit: () => {} } });

    await server.shutdown();

    expect(server.state).toBe('STOPPED');
  });
});
