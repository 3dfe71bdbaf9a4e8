import { parseArgs } from './check-args';

describe('parseArgs', () => {
  it('reads limit, start id and dry run', () => {
    expect(parseArgs(['--limit=50', '--start-id=1200', '--dry-run'])).toEqual({
      limit: 50,
      startId: 1200,
      dryRun: true,
    });
  });

  it('leaves missing flags undefined', () => {
    expect(parseArgs([])).toEqual({ limit: undefined, startId: undefined, dryRun: false });
  });

  it('accepts zero', () => {
    expect(parseArgs(['--limit=0']).limit).toBe(0);
  });

  it.each([['--limit=abc'], ['--limit=-1'], ['--limit=2.5']])('rejects %s', (arg) => {
    expect(() => parseArgs([arg])).toThrow('--limit deve ser um inteiro >= 0');
  });

  it('rejects an invalid start id', () => {
    expect(() => parseArgs(['--start-id=x'])).toThrow('--start-id deve ser um inteiro >= 0');
  });
});
