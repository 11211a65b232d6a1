import { ConfigService } from './config.service';

describe('ConfigService', () => {
  const config = new ConfigService({
    PORT: '5000',
    REQUIRED_EVALUATORS: ' 3 ',
    SEQUENTIAL_SUBMISSION: 'TRUE',
    ENFORCE_WEIGHT_SUM: 'off',
    BROKEN: 'abc',
    EMPTY: '',
  });

  it('returns required values and throws when missing', () => {
    expect(config.get('PORT')).toBe('5000');
    expect(() => config.get('DB_HOST')).toThrow('Missing required environment variable DB_HOST');
  });

  it('parses numbers with a fallback', () => {
    expect(config.getNumber('REQUIRED_EVALUATORS', 1)).toBe(3);
    expect(config.getNumber('MIN_DEADLINE_GAP_DAYS', 15)).toBe(15);
    expect(config.getNumber('EMPTY', 7)).toBe(7);
    expect(() => config.getNumber('BROKEN', 1)).toThrow('BROKEN must be numeric');
  });

  it('parses booleans with a fallback', () => {
    expect(config.getBoolean('SEQUENTIAL_SUBMISSION', false)).toBe(true);
    expect(config.getBoolean('ENFORCE_WEIGHT_SUM', true)).toBe(false);
    expect(config.getBoolean('MISSING', true)).toBe(true);
  });
});
