import { validate } from './env.validation';

describe('validate', () => {
  it('converts numeric variables', () => {
    const config = validate({ PORT: '8080', MAP_WIDTH: '800', MAP_PALETTE: 'subtle' });

    expect(config.PORT).toBe(8080);
    expect(config.MAP_WIDTH).toBe(800);
    expect(config.MAP_PALETTE).toBe('subtle');
  });

  it('accepts an empty environment', () => {
    expect(() => validate({})).not.toThrow();
  });

  it('rejects unknown map providers', () => {
    expect(() => validate({ MAP_PROVIDER: 'google' })).toThrow('property MAP_PROVIDER');
  });

  it('rejects malformed body limits', () => {
    expect(() => validate({ BODY_LIMIT: 'lots' })).toThrow('property BODY_LIMIT');
  });

  it('rejects out of range ports', () => {
    expect(() => validate({ PORT: '70000' })).toThrow('property PORT');
  });
});
