import {
  hasRunOnceFlag,
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseRequiredString,
  parseStringWithDefault,
  resolveImplicitTls,
} from '../config.parsers';

describe('parseOptionalBoolean', () => {
  it('should return the default when undefined', () => {
    expect(parseOptionalBoolean(undefined)).toBe(false);
    expect(parseOptionalBoolean(undefined, true)).toBe(true);
  });

  it.each(['true', '1', 'yes', 'y', 'on', ' TRUE '])('should parse %p as true', (value) => {
    expect(parseOptionalBoolean(value)).toBe(true);
  });

  it.each(['false', '0', 'no', 'n', 'off', ' Off '])('should parse %p as false', (value) => {
    expect(parseOptionalBoolean(value, true)).toBe(false);
  });

  it('should fall back to the default for unrecognized values', () => {
    expect(parseOptionalBoolean('maybe', true)).toBe(true);
    expect(parseOptionalBoolean('maybe', false)).toBe(false);
  });
});

describe('parseNumberWithDefault', () => {
  it('should return the default for missing or blank values', () => {
    expect(parseNumberWithDefault(undefined, 42)).toBe(42);
    expect(parseNumberWithDefault('  ', 42)).toBe(42);
  });

  it('should parse whole numbers', () => {
    expect(parseNumberWithDefault('993', 0)).toBe(993);
    expect(parseNumberWithDefault('0', 5)).toBe(0);
  });

  it('should reject negative and non-numeric values', () => {
    expect(() => parseNumberWithDefault('-1', 0)).toThrow('must be a non-negative finite number');
    expect(() => parseNumberWithDefault('abc', 0)).toThrow('Invalid numeric value: "abc"');
  });

  it('should reject fractions', () => {
    expect(() => parseNumberWithDefault('1.5', 0)).toThrow('(must be an integer)');
  });
});

describe('parseStringWithDefault', () => {
  it('should return the default for missing or empty values', () => {
    expect(parseStringWithDefault(undefined, 'INBOX')).toBe('INBOX');
    expect(parseStringWithDefault('', 'INBOX')).toBe('INBOX');
  });

  it('should keep a provided value as is', () => {
    expect(parseStringWithDefault('Archive/2024', 'INBOX')).toBe('Archive/2024');
  });
});

describe('parseRequiredString', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should return the trimmed value', () => {
    process.env.IMAP_HOST = ' imap.example.com ';
    expect(parseRequiredString('IMAP_HOST')).toBe('imap.example.com');
  });

  it('should throw when the variable is unset or blank', () => {
    delete process.env.IMAP_HOST;
    expect(() => parseRequiredString('IMAP_HOST')).toThrow('IMAP_HOST is required');

    process.env.IMAP_HOST = '   ';
    expect(() => parseRequiredString('IMAP_HOST')).toThrow('IMAP_HOST is required');
  });
});

describe('resolveImplicitTls', () => {
  it('should enable TLS on the implicit-TLS port regardless of the flag', () => {
    expect(resolveImplicitTls(false, 993, 993)).toBe(true);
  });

  it('should follow the flag on other ports', () => {
    expect(resolveImplicitTls(false, 143, 993)).toBe(false);
    expect(resolveImplicitTls(true, 143, 993)).toBe(true);
  });
});

describe('hasRunOnceFlag', () => {
  it('should detect --once among the arguments', () => {
    expect(hasRunOnceFlag(['node', 'main.js', '--once'])).toBe(true);
  });

  it('should ignore the executable and script positions', () => {
    expect(hasRunOnceFlag(['--once', 'main.js'])).toBe(false);
    expect(hasRunOnceFlag(['node', 'main.js'])).toBe(false);
  });
});
