import { parseArgs, USAGE } from './cli-options';

describe('parseArgs', () => {
  it('takes the script path and an open range', () => {
    expect(parseArgs(['script.md'])).toEqual({ scriptPath: 'script.md', range: { start: undefined, end: undefined } });
  });

  it('reads --start and --end around the positional path', () => {
    expect(parseArgs(['--start', '3', 'episode.md', '--end', '7'])).toEqual({
      scriptPath: 'episode.md',
      range: { start: 3, end: 7 },
    });
  });

  it('accepts the short flags', () => {
    expect(parseArgs(['-s', '2', 'a.md'])).toEqual({ scriptPath: 'a.md', range: { start: 2, end: undefined } });
  });

  it('requires a script path', () => {
    expect(() => parseArgs(['--start', '1'])).toThrow(USAGE);
  });

  it('rejects an index that is not a positive integer', () => {
    expect(() => parseArgs(['a.md', '--end', '0'])).toThrow('--end must be a positive segment index, got "0"');
    expect(() => parseArgs(['a.md', '--start', 'x'])).toThrow('--start must be a positive segment index, got "x"');
  });

  it('rejects an inverted range', () => {
    expect(() => parseArgs(['a.md', '--start', '5', '--end', '2'])).toThrow(
      '--start (5) must not be greater than --end (2)',
    );
  });
});
