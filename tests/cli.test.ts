import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCli, type CliIO } from '../src/bin/cadence.js';

const clean = 'input a: Int64 @ 1Hz\noutput b := a\n';
const broken = 'input a: Int64 @ 1Hz\noutput b := a + c\n';

describe('cadence check', () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let io: CliIO;

  const write = (name: string, content: string) => fs.writeFileSync(path.join(dir, name), content);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cadence-cli-'));
    out = [];
    err = [];
    io = { cwd: dir, out: text => out.push(text), err: text => err.push(text) };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('prints help', async () => {
    expect(await runCli(['--help'], io)).toBe(0);
    expect(out.join('\n')).toContain('check <files|globs...>');
  });

  test('rejects unknown commands', async () => {
    expect(await runCli(['lint', '--no-color'], io)).toBe(1);
    expect(err).toEqual(["error: Unknown command 'lint'; run 'cadence --help'"]);
  });

  test('reports a clean file', async () => {
    write('ok.cdc', clean);
    expect(await runCli(['check', 'ok.cdc', '--no-color'], io)).toBe(0);
    expect(out).toEqual(['ok.cdc: no problems found']);
    expect(err).toEqual([]);
  });

  test('reports diagnostics and fails', async () => {
    write('bad.cdc', broken);
    expect(await runCli(['check', 'bad.cdc', '--no-color'], io)).toBe(1);
    expect(out).toEqual([
      [
        "error[UndeclaredStream]: Undeclared stream 'c'",
        '  --> bad.cdc:2:17',
        '2 | output b := a + c',
        '  | ' + ' '.repeat(16) + '^',
        '',
        '1 error',
      ].join('\n'),
    ]);
  });

  test('expands globs in a stable order', async () => {
    write('ok.cdc', clean);
    write('bad.cdc', broken);
    write('notes.txt', 'not a spec');
    expect(await runCli(['check', '*.cdc', '--no-color'], io)).toBe(1);
    expect(out).toHaveLength(2);
    expect(out[0]).toMatch(/^error\[UndeclaredStream\]/);
    expect(out[1]).toBe('ok.cdc: no problems found');
  });

  test('prints JSON with the analyzed program and schedule', async () => {
    write('ok.cdc', clean);
    expect(await runCli(['check', 'ok.cdc', '--json', '--schedule'], io)).toBe(0);
    expect(JSON.parse(out[0])).toEqual({
      success: true,
      files: [
        {
          file: 'ok.cdc',
          success: true,
          diagnostics: [],
          streams: [
            { name: 'a', kind: 'input', type: 'Int64', pacing: '1Hz', layer: 0, memory: { samples: 1 } },
            { name: 'b', kind: 'output', type: 'Int64', pacing: '1Hz', layer: 1, memory: { samples: 1 } },
          ],
          evaluationOrder: ['a', 'b'],
          schedule: { gcd: '1', hyperPeriod: '1', deadlines: [{ pause: '1', due: ['b'] }] },
        },
      ],
    });
  });

  test('lists diagnostics in JSON', async () => {
    write('bad.cdc', broken);
    expect(await runCli(['check', 'bad.cdc', '--json'], io)).toBe(1);
    expect(JSON.parse(out[0])).toEqual({
      success: false,
      files: [
        {
          file: 'bad.cdc',
          success: false,
          diagnostics: [
            {
              file: 'bad.cdc',
              severity: 'error',
              code: 'UndeclaredStream',
              message: "Undeclared stream 'c'",
              line: 2,
              column: 17,
            },
          ],
        },
      ],
    });
  });

  test('keeps the graph alone on stdout', async () => {
    write('ok.cdc', clean);
    expect(await runCli(['check', 'ok.cdc', '--dot', '--no-color'], io)).toBe(0);
    expect(err).toEqual(['ok.cdc: no problems found']);
    expect(out).toHaveLength(1);
    expect(out[0].split('\n')[0]).toBe('digraph CadenceStreams {');
  });

  test('prints the schedule as text', async () => {
    write('ok.cdc', clean);
    expect(await runCli(['check', 'ok.cdc', '--schedule', '--no-color'], io)).toBe(0);
    expect(out).toEqual(['ok.cdc: no problems found', 'schedule: gcd 1s, hyper-period 1s\n  +1s  b']);
  });

  test('checks the files the config includes', async () => {
    write('ok.cdc', clean);
    write('cadence.config.json', JSON.stringify({ include: '*.cdc', warnUnusedInputs: false }));
    expect(await runCli(['check', '--no-color'], io)).toBe(0);
    expect(out).toEqual(['ok.cdc: no problems found']);
  });

  test('applies config options to the analysis', async () => {
    write('event.cdc', 'input a: Int64\ninput b: Int64\noutput s := a + b\noutput t @ a := s\n');
    write('strict.json', JSON.stringify({ eventCombination: 'all' }));
    expect(await runCli(['check', 'event.cdc', '--no-color'], io)).toBe(0);
    out = [];
    expect(await runCli(['check', 'event.cdc', '--config', 'strict.json', '--no-color'], io)).toBe(1);
    expect(out[0].split('\n')[0]).toBe(
      "error[InconsistentPacing]: 't' is evaluated on events of a but 's' is only available on events of a & b; read it with hold() or tighten the activation"
    );
  });

  test('checks the bundled example with its config', async () => {
    io = { ...io, cwd: path.resolve(__dirname, '../examples') };
    expect(await runCli(['check', '--no-color'], io)).toBe(0);
    expect(out).toEqual(['altimeter.cdc: no problems found']);
  });

  test('rejects an invalid config', async () => {
    write('ok.cdc', clean);
    write('strict.json', JSON.stringify({ frequencyPolicy: 'loose' }));
    expect(await runCli(['check', 'ok.cdc', '--config', 'strict.json', '--no-color'], io)).toBe(1);
    expect(err).toEqual(['Invalid strict.json:', '  - frequencyPolicy must be "integer-multiple" or "equal"']);
    expect(out).toEqual([]);
  });

  test('rejects a config that is not JSON', async () => {
    write('cadence.config.json', '{ include: ');
    expect(await runCli(['check', 'ok.cdc', '--no-color'], io)).toBe(1);
    expect(err[0]).toBe('Invalid cadence.config.json:');
    expect(err).toHaveLength(2);
  });

  test('a named config file has to exist', async () => {
    expect(await runCli(['check', 'ok.cdc', '--config', 'nope.json', '--no-color'], io)).toBe(1);
    expect(err).toEqual([`error: Config file not found: ${path.join(dir, 'nope.json')}`]);
  });

  test('needs input files', async () => {
    expect(await runCli(['check', '--no-color'], io)).toBe(1);
    expect(err).toEqual(['error: No input files; name them or set "include" in cadence.config.json']);
    err = [];
    expect(await runCli(['check', 'specs/*.cdc', '--no-color'], io)).toBe(1);
    expect(err).toEqual(['error: No files match specs/*.cdc']);
  });
});
