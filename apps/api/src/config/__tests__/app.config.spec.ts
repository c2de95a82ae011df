import { logLevels } from '../app.config';

describe('logLevels', () => {
  it('includes every level up to the threshold', () => {
    expect(logLevels('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(logLevels('verbose')).toHaveLength(6);
  });

  it('falls back to log for unknown names', () => {
    expect(logLevels('chatty')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
