import { generateId } from '../utils/ids';

describe('generateId', () => {
  it('includes the prefix when provided', () => {
    expect(generateId('session').startsWith('session_')).toBe(true);
  });

  it('omits the prefix separator when prefix is empty', () => {
    expect(/^\d+_[a-z0-9]+$/.test(generateId())).toBe(true);
  });

  it('returns unique values on repeated calls', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId('session')));
    expect(ids.size).toBe(100);
  });

  it('includes a timestamp component after the prefix', () => {
    const before = Date.now();
    const id = generateId('session');
    const after = Date.now();
    const ts = parseInt(id.split('_')[1], 10);
    expect(ts).toBeGreaterThanOrEqual(before);
    expect(ts).toBeLessThanOrEqual(after);
  });
});
