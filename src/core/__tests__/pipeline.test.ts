import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { parseDxf } from '../../parse/dxf-reader';
import { convertDrawing, convertDxfFile } from '../pipeline';
import { ParseError } from '../errors';
import { LogManager } from '../logger';
import { circle, dxf, polyline } from '../../__tests__/helpers/dxf';

const BOARD = dxf(
  polyline({ layer: 'Top Copper', flags: 1, vertices: [[1, 1], [5, 1], [5, 4], [1, 4]] }),
  circle({ layer: 'Drill', x: 10, y: 10, radius: 0.25 })
);

const EXPECTED_GTL = [
  'G04 dxf-cam artwork*',
  '%FSLAX26Y26*%',
  '%MOMM*%',
  '%SRX1Y1I0J0*%',
  '%LPD*%',
  '%ADD10C,0.010000*%',
  '%ADD11C,0.500000*%',
  'G36*',
  'X1000000Y1000000D02*',
  'X5000000D01*',
  'Y4000000D01*',
  'X1000000D01*',
  'Y1000000D01*',
  'G37*',
  'M02*',
  '',
].join('\n');

const EXPECTED_GDD = ['%', 'M48', 'METRIC,TZ', 'M71', 'T01C0.500', '%', 'G05', 'T01', 'X10.00Y10.00', 'M30', ''].join(
  '\n'
);

beforeAll(() => {
  LogManager.getInstance().setLogLevel('silent');
});

afterAll(() => {
  LogManager.getInstance().setLogLevel('info');
});

describe('convertDrawing', () => {
  it('produces one region on top copper and one hole in the drill file', () => {
    const outputs = convertDrawing(parseDxf(BOARD));

    expect(outputs.map((o) => o.extension)).toEqual(['.gbl', '.gbo', '.gbs', '.gtl', '.gto', '.gts', '.gdd']);

    const gtl = outputs.find((o) => o.extension === '.gtl');
    expect(gtl?.content).toBe(EXPECTED_GTL);
    expect(gtl?.counts).toEqual({ tracks: 0, regions: 1, circles: 0 });

    const gdd = outputs.find((o) => o.extension === '.gdd');
    expect(gdd?.content).toBe(EXPECTED_GDD);
    expect(gdd?.stats).toEqual({ holes: 1 });
  });

  it('leaves roles without geometry empty', () => {
    const outputs = convertDrawing(parseDxf(BOARD));
    const empty = outputs.filter((o) => o.content === null).map((o) => o.role);

    expect(empty).toEqual(['bottom_copper', 'bottom_overlay', 'bottom_soldermask', 'top_overlay', 'top_soldermask']);
  });

  it('does not share plotter state between files', () => {
    const drawing = parseDxf(
      dxf(
        polyline({ layer: 'Top', width: 0.5, vertices: [[1, 1], [2, 1]] }),
        polyline({ layer: 'Bottom', width: 0.5, vertices: [[1, 1], [2, 1]] })
      )
    );
    const outputs = convertDrawing(drawing);
    const top = outputs.find((o) => o.role === 'top_copper');
    const bottom = outputs.find((o) => o.role === 'bottom_copper');

    expect(top?.content).not.toBeNull();
    expect(bottom?.content).toBe(top?.content);
  });

  it('reports unmapped layers', () => {
    LogManager.getInstance().setLogLevel('warn');
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    convertDrawing(parseDxf(dxf(circle({ layer: 'Notes', x: 1, y: 1, radius: 1 }))));

    expect(warn).toHaveBeenCalledWith('[Pipeline] Layer "Notes" is not mapped to any output and will be ignored');
    warn.mockRestore();
    LogManager.getInstance().setLogLevel('silent');
  });
});

describe('convertDxfFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dxf-cam-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the non-empty files next to the input and removes stale ones', () => {
    const input = join(dir, 'board.dxf');
    writeFileSync(input, BOARD);
    writeFileSync(join(dir, 'board.gbl'), 'stale');

    const { files } = convertDxfFile(input);

    expect(readFileSync(join(dir, 'board.gtl'), 'utf8')).toBe(EXPECTED_GTL);
    expect(readFileSync(join(dir, 'board.gdd'), 'utf8')).toBe(EXPECTED_GDD);
    expect(existsSync(join(dir, 'board.gbl'))).toBe(false);
    expect(existsSync(join(dir, 'board.gts'))).toBe(false);

    expect(files.find((f) => f.role === 'bottom_copper')?.status).toBe('deleted');
    expect(files.find((f) => f.role === 'top_soldermask')?.status).toBe('skipped');
    expect(files.find((f) => f.role === 'top_copper')?.status).toBe('written');
  });

  it('honours an explicit output base', () => {
    const input = join(dir, 'board.dxf');
    writeFileSync(input, BOARD);

    convertDxfFile(input, { outputBase: join(dir, 'panel') });

    expect(existsSync(join(dir, 'panel.gtl'))).toBe(true);
    expect(existsSync(join(dir, 'board.gtl'))).toBe(false);
  });

  it('writes nothing when the input fails to parse', () => {
    const input = join(dir, 'broken.dxf');
    writeFileSync(input, ['0', 'CIRCLE', '8', 'Drill', '10', 'ten', '0', 'EOF'].join('\n'));

    expect(() => convertDxfFile(input)).toThrow(ParseError);
    expect(existsSync(join(dir, 'broken.gdd'))).toBe(false);
  });

  it('reports a missing input as an unreadable stream', () => {
    let caught: unknown;
    try {
      convertDxfFile(join(dir, 'missing.dxf'));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ParseError);
    expect(caught instanceof ParseError && caught.code).toBe('UNREADABLE_INPUT');
  });
});
