import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('treats info as Nest log', () => {
    expect(resolveLogLevels('info')).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('is case-insensitive', () => {
    expect(resolveLogLevels(' WARN ')).toEqual(['fatal', 'error', 'warn']);
  });

  it('enables everything at verbose', () => {
    expect(resolveLogLevels('verbose')).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('falls back to log for unknown levels', () => {
    expect(resolveLogLevels('chatty')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
