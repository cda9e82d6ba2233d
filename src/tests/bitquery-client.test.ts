import { AxiosAdapter, AxiosError, CanceledError, InternalAxiosRequestConfig } from 'axios';
import { BitqueryClient, parseAmount, unwrapRoot } from '../integrations/bitquery-client';
import { FOURMEME_FIRST_TRANSFERS } from '../integrations/bitquery-queries';
import { CheckCancelledError, UpstreamApiError } from '../utils/errors';

type Adapter = AxiosAdapter;

function clientWith(adapter: AxiosAdapter) {
  return new BitqueryClient('test-secret', 'https://bitquery.test/graphql', {
    axiosConfig: { adapter },
  });
}

function respondWith(data: unknown): jest.Mock<ReturnType<Adapter>, Parameters<Adapter>> {
  const adapter = jest.fn<ReturnType<Adapter>, Parameters<Adapter>>();
  adapter.mockImplementation(async config => ({ data, status: 200, statusText: 'OK', headers: {}, config }));
  return adapter;
}

function failWithStatus(status: number): jest.Mock<ReturnType<Adapter>, Parameters<Adapter>> {
  const adapter = jest.fn<ReturnType<Adapter>, Parameters<Adapter>>();
  adapter.mockImplementation(async config => {
    throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, null, {
      data: {},
      status,
      statusText: '',
      headers: {},
      config,
    });
  });
  return adapter;
}

describe('BitqueryClient', () => {
  test('should post the query with a bearer token', async () => {
    const adapter = respondWith({ data: { EVM: { Transfers: [] } } });

    const data = await clientWith(adapter).query(FOURMEME_FIRST_TRANSFERS, { token: '0xabc' });

    expect(data).toEqual({ EVM: { Transfers: [] } });
    const config: InternalAxiosRequestConfig = adapter.mock.calls[0][0];
    expect(config.method).toBe('post');
    expect(config.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(String(config.data))).toEqual({
      query: FOURMEME_FIRST_TRANSFERS.text,
      variables: { token: '0xabc' },
    });
  });

  test('should surface GraphQL errors as upstream failures', async () => {
    const adapter = respondWith({ data: null, errors: [{ message: 'Field not found' }, { message: 'Bad limit' }] });

    await expect(clientWith(adapter).query(FOURMEME_FIRST_TRANSFERS, {}))
      .rejects.toThrow('Bitquery query FourMemeFirstTransfers failed: Field not found; Bad limit');
  });

  test('should reject a response without data', async () => {
    const adapter = respondWith({});

    await expect(clientWith(adapter).query(FOURMEME_FIRST_TRANSFERS, {}))
      .rejects.toThrow('Bitquery query FourMemeFirstTransfers returned no data');
  });

  test('should explain a rejected API key', async () => {
    const error: unknown = await clientWith(failWithStatus(401)).query(FOURMEME_FIRST_TRANSFERS, {}).catch(e => e);

    expect(error).toBeInstanceOf(UpstreamApiError);
    if (!(error instanceof UpstreamApiError)) throw error;
    expect(error.message).toBe('bitquery rejected the API key (HTTP 401)');
    expect(error.status).toBe(401);
  });

  test('should explain a rate limit', async () => {
    await expect(clientWith(failWithStatus(429)).query(FOURMEME_FIRST_TRANSFERS, {}))
      .rejects.toThrow('bitquery rate limit reached, try again later');
  });

  test('should report other HTTP failures with their status', async () => {
    await expect(clientWith(failWithStatus(503)).query(FOURMEME_FIRST_TRANSFERS, {}))
      .rejects.toThrow('bitquery request failed with HTTP 503');
  });

  test('should report a timeout', async () => {
    const adapter = jest.fn<ReturnType<Adapter>, Parameters<Adapter>>();
    adapter.mockImplementation(async config => {
      throw new AxiosError('timeout of 120000ms exceeded', 'ECONNABORTED', config);
    });

    await expect(clientWith(adapter).query(FOURMEME_FIRST_TRANSFERS, {}))
      .rejects.toThrow('bitquery request timed out');
  });

  test('should turn a cancelled request into a cancelled check', async () => {
    const adapter = jest.fn<ReturnType<Adapter>, Parameters<Adapter>>();
    adapter.mockImplementation(async () => {
      throw new CanceledError();
    });

    await expect(clientWith(adapter).query(FOURMEME_FIRST_TRANSFERS, {}))
      .rejects.toThrow(CheckCancelledError);
  });
});

describe('Bitquery response helpers', () => {
  test('should unwrap object and list roots', () => {
    expect(unwrapRoot({ a: 1 })).toEqual({ a: 1 });
    expect(unwrapRoot([{ a: 1 }])).toEqual({ a: 1 });
    expect(unwrapRoot([])).toBeUndefined();
    expect(unwrapRoot(null)).toBeUndefined();
  });

  test('should parse amounts and count garbage as zero', () => {
    expect(parseAmount('1234.5')).toBe(1234.5);
    expect(parseAmount(42)).toBe(42);
    expect(parseAmount('')).toBe(0);
    expect(parseAmount(null)).toBe(0);
    expect(parseAmount('NaN')).toBe(0);
    expect(parseAmount('Infinity')).toBe(0);
  });
});
