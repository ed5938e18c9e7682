import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import net from 'net';
import { spawn, type ChildProcess } from 'child_process';
import {
  PortProber,
  firstPid,
  fuserLocator,
  lsofLocator,
  parseSsOutput,
  type ProcessLocator,
} from '../backend/port-prober.js';
import { findClosedPort } from './helpers/stub-server.js';

vi.mock('../utils/log.js', () => ({
  log: vi.fn(),
  errorMessage: (e: unknown) => (e instanceof Error ? e.message : String(e)),
}));

function locator(name: string, locate: ProcessLocator['locate']): ProcessLocator {
  return { name, locate: vi.fn(locate) };
}

let listener: net.Server;
let openPort: number;

beforeAll(async () => {
  listener = net.createServer(socket => socket.destroy());
  await new Promise<void>(resolve => listener.listen(0, '127.0.0.1', () => resolve()));
  const addr = listener.address();
  if (!addr || typeof addr === 'string') throw new Error('no port');
  openPort = addr.port;
});

afterAll(async () => {
  await new Promise<void>(resolve => listener.close(() => resolve()));
});

describe('PortProber', () => {
  it('reports a free port without looking for an owner', async () => {
    const lsof = locator('lsof', async () => 1234);
    const prober = new PortProber({ locators: [lsof] });

    const probe = await prober.probe(await findClosedPort());

    expect(probe).toEqual({ occupied: false });
    expect(lsof.locate).not.toHaveBeenCalled();
  });

  it('tries locators in order and stops at the first pid', async () => {
    const broken = locator('lsof', async () => { throw new Error('lsof: not found'); });
    const empty = locator('fuser', async () => undefined);
    const found = locator('ss', async () => 4242);
    const never = locator('extra', async () => 1);
    const readCommand = vi.fn().mockResolvedValue('opencode serve --port 4096');
    const prober = new PortProber({ locators: [broken, empty, found, never], readCommand });

    const probe = await prober.probe(openPort);

    expect(probe).toEqual({ occupied: true, pid: 4242, command: 'opencode serve --port 4096' });
    expect(empty.locate).toHaveBeenCalledWith(openPort);
    expect(never.locate).not.toHaveBeenCalled();
    expect(readCommand).toHaveBeenCalledWith(4242);
  });

  it('never reports its own process as the owner', async () => {
    const self = locator('lsof', async () => process.pid);
    const other = locator('ss', async () => 4242);
    const prober = new PortProber({ locators: [self, other], readCommand: async () => undefined });

    expect(await prober.probe(openPort)).toEqual({ occupied: true, pid: 4242, command: undefined });
    expect(other.locate).toHaveBeenCalledTimes(1);
  });

  it('reports an occupied port with unknown owner when every locator fails', async () => {
    const readCommand = vi.fn();
    const prober = new PortProber({
      locators: [locator('lsof', async () => undefined), locator('ss', async () => { throw new Error('x'); })],
      readCommand,
    });

    expect(await prober.probe(openPort)).toEqual({ occupied: true });
    expect(readCommand).not.toHaveBeenCalled();
  });
});

describe('parseSsOutput', () => {
  const output = [
    'State  Recv-Q Send-Q Local Address:Port  Peer Address:Port Process',
    'LISTEN 0      511        127.0.0.1:3000       0.0.0.0:*    users:(("node",pid=100,fd=18))',
    'LISTEN 0      511        127.0.0.1:4096       0.0.0.0:*    users:(("opencode",pid=31337,fd=20))',
  ].join('\n');

  it('finds the pid listening on the port', () => {
    expect(parseSsOutput(output, 4096)).toBe(31337);
    expect(parseSsOutput(output, 3000)).toBe(100);
  });

  it('does not match a port that is only a prefix', () => {
    expect(parseSsOutput(output, 409)).toBeUndefined();
  });

  it('skips its own pid on a shared socket line', () => {
    const shared = `LISTEN 0 511 127.0.0.1:4096 0.0.0.0:* users:(("node",pid=${process.pid},fd=3),("opencode",pid=31337,fd=20))`;
    expect(parseSsOutput(shared, 4096)).toBe(31337);
  });
});

describe('firstPid', () => {
  it('returns the first pid that is not this process', () => {
    expect(firstPid(`${process.pid}\n4242\n`)).toBe(4242);
    expect(firstPid(String(process.pid))).toBeUndefined();
    expect(firstPid(' 17 18', 17)).toBe(18);
    expect(firstPid('')).toBeUndefined();
  });
});

describe('locators against a real listener', () => {
  let server: ChildProcess;
  let client: net.Socket;
  let port: number;

  beforeAll(async () => {
    const script = [
      "const s = require('net').createServer(() => {});",
      "s.listen(0, '127.0.0.1', () => process.stdout.write(s.address().port + '\\n'));",
    ].join('');
    server = spawn(process.execPath, ['-e', script], { stdio: ['ignore', 'pipe', 'ignore'] });
    port = await new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.stdout?.once('data', (chunk: Buffer) => resolve(parseInt(chunk.toString(), 10)));
    });

    // 本进程作为客户端保持一条连接
    client = net.createConnection({ host: '127.0.0.1', port });
    await new Promise<void>(resolve => client.once('connect', () => resolve()));
  }, 15_000);

  afterAll(() => {
    client.destroy();
    server.kill();
  });

  it('points at the listening process, not at a connected client', async () => {
    // 工具未安装时为 undefined
    expect([undefined, server.pid]).toContain(await lsofLocator.locate(port));
    expect([undefined, server.pid]).toContain(await fuserLocator.locate(port));

    const probe = await new PortProber().probe(port);
    expect(probe.occupied).toBe(true);
    expect([undefined, server.pid]).toContain(probe.pid);
  }, 15_000);
});
