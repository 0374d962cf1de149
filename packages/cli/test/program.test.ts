/**
 * Tests for the archconf command line: argument handling and exit status.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { main } from '../src/program.js';
import { createConsoleCapture, type ConsoleCapture } from '../../../test/helpers/consoleCapture.js';

describe('archconf command line', () => {
  let cwd: string;
  let capture: ConsoleCapture;
  let out: string[];
  let err: string[];

  const run = (...args: string[]) =>
    main(args, {
      cwd,
      output: {
        writeOut: (str) => out.push(str),
        writeErr: (str) => err.push(str),
      },
    });

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'archconf-program-'));
    capture = createConsoleCapture();
    capture.install();
    out = [];
    err = [];
  });

  afterEach(() => {
    capture.restore();
    rmSync(cwd, { recursive: true, force: true });
  });

  it('should exit 2 on an extra argument without converting', async () => {
    writeFileSync(join(cwd, 'a.db'), 'record(ai, "A") {\n  info(archive, "monitor, 00:00:01")\n}\n');

    const status = await run('a.db', 'extra');

    assert.strictEqual(status, 2);
    assert.match(err.join(''), /too many arguments/);
    assert.strictEqual(existsSync(join(cwd, 'a_arch.xml')), false);
  });

  it('should exit 2 on an unknown option', async () => {
    const status = await run('--bogus', 'a.db');

    assert.strictEqual(status, 2);
    assert.match(err.join(''), /unknown option '--bogus'/);
  });

  it('should exit 2 when no database is given', async () => {
    const status = await run();

    assert.strictEqual(status, 2);
    assert.strictEqual(capture.lines('error')[0], '✗ ERR_MISSING_ARGUMENT: Missing input file name');
  });

  it('should exit 0 for --version', async () => {
    const status = await run('--version');

    assert.strictEqual(status, 0);
    assert.strictEqual(out.join(''), '0.1.0\n');
  });

  it('should exit 0 for --help', async () => {
    const status = await run('--help');

    assert.strictEqual(status, 0);
    assert.match(out.join(''), /Usage: archconf \[options\] \[database\]/);
  });

  it('should exit 0 after converting one database', async () => {
    writeFileSync(join(cwd, 'a.db'), 'record(ai, "A") {\n  info(archive, "monitor, 00:00:01")\n}\n');

    const status = await run('a.db');

    assert.strictEqual(status, 0);
    assert.ok(existsSync(join(cwd, 'a_arch.xml')));
    assert.deepStrictEqual(err, []);
  });
});
