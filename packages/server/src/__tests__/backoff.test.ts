import { calculateBackoffDelay } from '../gateway/backoff';

describe('calculateBackoffDelay', () => {
  const config = { baseDelayMs: 250, maxDelayMs: 8000 };

  it('should double the base delay per attempt', () => {
    const noJitter = () => 0.5;

    expect(calculateBackoffDelay(0, config, noJitter)).toBe(250);
    expect(calculateBackoffDelay(1, config, noJitter)).toBe(500);
    expect(calculateBackoffDelay(3, config, noJitter)).toBe(2000);
  });

  it('should scale by 0.5x to 1.5x with jitter', () => {
    expect(calculateBackoffDelay(0, config, () => 0)).toBe(125);
    expect(calculateBackoffDelay(0, config, () => 1)).toBe(375);
  });

  it('should never exceed maxDelayMs', () => {
    expect(calculateBackoffDelay(10, config, () => 1)).toBe(8000);
    expect(calculateBackoffDelay(10, config, () => 0)).toBe(4000);
  });

  it('should return 0 when backoff is disabled', () => {
    expect(calculateBackoffDelay(4, { baseDelayMs: 0, maxDelayMs: 0 })).toBe(0);
  });
});
