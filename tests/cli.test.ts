import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import winston from 'winston';
import { mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { createProgram, isEntryPoint, type CliDeps } from '../src/cli.js';
import { createApp, type App } from '../src/app.js';
import { resolveConfig } from '../src/config.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const logger = winston.createLogger({ silent: true });

describe('textrouter CLI', () => {
  let app: App;
  let lines: string[];
  let deps: CliDeps;
  let close: () => void;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    mockFetch.mockReset();
    app = createApp(resolveConfig({
      database: { path: ':memory:' },
      handlers: [{ name: 'echo', keyword: 'echo', prefix: 'echo: ' }],
    }, {}), { logger });
    // commands close the app when done; keep it open across commands
    close = app.close;
    app.close = vi.fn();
    lines = [];
    deps = {
      openApp: vi.fn(async () => app),
      print: (line) => { lines.push(line); },
    };
  });

  afterEach(() => {
    close();
  });

  async function run(...args: string[]): Promise<void> {
    const program = createProgram(deps);
    program.exitOverride();
    await program.parseAsync(['node', 'textrouter', ...args]);
  }

  it('should dispatch a received message and show its replies', async () => {
    await run('receive', 'demo-backend', '+1555', 'echo', 'hi');

    expect(lines).toEqual([
      '#1 [handled] demo-backend/+1555: echo hi',
      '  -> #2 [queued] demo-backend/+1555: echo: hi',
    ]);
    expect(app.close).toHaveBeenCalledTimes(1);
  });

  it('should send a message through the outgoing phase', async () => {
    await run('send', 'demo-backend', '+1777', 'see', 'you', 'soon');
    expect(lines).toEqual(['#1 [queued] demo-backend/+1777: see you soon']);
  });

  it('should list and flush the outbox', async () => {
    await run('outbox');
    await run('send', 'demo-backend', '+1777', 'later');
    await run('outbox');
    await run('flush');

    expect(lines).toEqual([
      'Outbox empty',
      '#1 [queued] demo-backend/+1777: later',
      '#1 [queued] demo-backend/+1777: later',
      'Sent 0, still queued 1',
    ]);
  });

  it('should mark a message sent', async () => {
    await run('send', 'demo-backend', '+1777', 'later');
    await run('mark-sent', '1');

    expect(lines[1]).toBe('#1 [sent] demo-backend/+1777: later');
    expect(app.router.getOutbox()).toEqual([]);
  });

  it('should reject a malformed message id', async () => {
    await expect(run('mark-sent', 'abc')).rejects.toThrow('Invalid message id: abc');
    expect(deps.openApp).not.toHaveBeenCalled();
  });

  it('should pass global options to the app factory', async () => {
    await run('-v', '-c', 'custom.yaml', 'outbox');
    expect(deps.openApp).toHaveBeenCalledWith({ config: 'custom.yaml', verbose: true });
  });
});

describe('isEntryPoint', () => {
  let dir: string;
  let script: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'textrouter-cli-'));
    script = join(dir, 'cli.js');
    writeFileSync(script, '');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should match the module run directly', () => {
    expect(isEntryPoint(script, pathToFileURL(script).href)).toBe(true);
  });

  it('should match the module run through an installed bin symlink', () => {
    const bin = join(dir, 'textrouter');
    symlinkSync(script, bin);

    expect(isEntryPoint(bin, pathToFileURL(script).href)).toBe(true);
  });

  it('should not match another script or a missing one', () => {
    const other = join(dir, 'other.js');
    writeFileSync(other, '');

    expect(isEntryPoint(other, pathToFileURL(script).href)).toBe(false);
    expect(isEntryPoint(join(dir, 'missing.js'), pathToFileURL(script).href)).toBe(false);
    expect(isEntryPoint(undefined, pathToFileURL(script).href)).toBe(false);
  });
});
