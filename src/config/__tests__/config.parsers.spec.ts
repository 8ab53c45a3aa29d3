import { parseBaseUrl, parseNumberWithDefault, parseOptionalBoolean, parseStringWithDefault } from '../config.parsers';

describe('parseOptionalBoolean', () => {
  it.each(['true', '1', 'yes', 'on', ' TRUE '])('reads %p as true', (value) => {
    expect(parseOptionalBoolean(value)).toBe(true);
  });

  it.each(['false', '0', ' False '])('reads %p as false', (value) => {
    expect(parseOptionalBoolean(value, true)).toBe(false);
  });

  it('falls back to the default', () => {
    expect(parseOptionalBoolean(undefined, true)).toBe(true);
    expect(parseOptionalBoolean('maybe', true)).toBe(true);
    expect(parseOptionalBoolean('maybe')).toBe(false);
  });
});

describe('parseNumberWithDefault', () => {
  it('parses integers', () => {
    expect(parseNumberWithDefault('8080', 1)).toBe(8080);
  });

  it('uses the default for missing values', () => {
    expect(parseNumberWithDefault(undefined, 7)).toBe(7);
    expect(parseNumberWithDefault('', 7)).toBe(7);
  });

  it.each(['-1', 'Infinity', 'ten'])('rejects %p', (value) => {
    expect(() => parseNumberWithDefault(value, 1)).toThrow(
      `Invalid numeric value: "${value}" (must be a non-negative finite number)`,
    );
  });

  it('rejects fractions', () => {
    expect(() => parseNumberWithDefault('2.5', 1)).toThrow('Invalid numeric value: "2.5" (must be an integer)');
  });
});

describe('parseStringWithDefault', () => {
  it('keeps a value and defaults an empty one', () => {
    expect(parseStringWithDefault('x', 'y')).toBe('x');
    expect(parseStringWithDefault('', 'y')).toBe('y');
    expect(parseStringWithDefault(undefined, 'y')).toBe('y');
  });
});

describe('parseBaseUrl', () => {
  it('drops trailing slashes', () => {
    expect(parseBaseUrl('https://issuer.example.com/', 'VCS_HOST_URL')).toBe('https://issuer.example.com');
    expect(parseBaseUrl(' http://edv.test:8071/base// ', 'VCS_EDV_URL')).toBe('http://edv.test:8071/base');
  });

  it('names the variable in errors', () => {
    expect(() => parseBaseUrl('edv.test', 'VCS_EDV_URL')).toThrow('VCS_EDV_URL must be an absolute URL (received: "edv.test")');
    expect(() => parseBaseUrl('ws://edv.test', 'VCS_EDV_URL')).toThrow(
      'VCS_EDV_URL must use http or https (received: "ws://edv.test")',
    );
  });
});
