import { buildCorsOriginHandler } from '../../../src/config/cors';

describe('buildCorsOriginHandler', () => {
  it('allows any origin when no allow-list is configured', () => {
    const callback = jest.fn<void, [Error | null, boolean?]>();
    buildCorsOriginHandler([])('https://any-origin.example', callback);
    expect(callback).toHaveBeenCalledWith(null, true);
  });

  it('allows requests without an origin header', () => {
    const callback = jest.fn<void, [Error | null, boolean?]>();
    buildCorsOriginHandler(['https://shop.example'])(undefined, callback);
    expect(callback).toHaveBeenCalledWith(null, true);
  });

  it('rejects origins outside the allow-list', () => {
    const callback = jest.fn<void, [Error | null, boolean?]>();
    buildCorsOriginHandler(['https://shop.example'])('https://evil.example', callback);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(callback.mock.calls[0]?.[1]).toBeUndefined();
  });
});
