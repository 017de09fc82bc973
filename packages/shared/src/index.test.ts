import { name, ConfigSchema, AppError, extractJsonObject } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@synthloop/shared');
  });

  it('re-exports the public surface', () => {
    expect(ConfigSchema).toBeDefined();
    expect(new AppError('UnknownError', 'x')).toBeInstanceOf(Error);
    expect(extractJsonObject('{"a":1}')).toEqual({ a: 1 });
  });
});
