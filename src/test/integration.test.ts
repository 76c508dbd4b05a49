import assert from 'node:assert/strict';
import { beforeEach, describe, test } from 'node:test';
import { MockRequestAdapter, parseString } from '../adapter/adapter';
import { getMockAdapter, mockDelete, mockGet } from '../builder/builder';
import {
  createMockableClient,
  getUrlTemplate,
  mockClientCollectionResponse,
  mockClientResponse,
} from '../client/client';
import {
  ParameterNotFoundError,
  UnconfiguredRequestError,
  createRequestDescriptor,
  getPathParameter,
  normalizeUrlTemplate,
  pathParameterEquals,
  type Logger,
} from '../core/index';
import { FundsClient, type Fund } from './funds_client';

const silent: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

describe('end to end: funds endpoint', () => {
  let adapter: MockRequestAdapter;

  beforeEach(() => {
    adapter = new MockRequestAdapter({ logger: silent });
    adapter.expect({
      method: 'GET',
      kind: 'object',
      template: '/api/funds/{fundId}',
      outcome: { type: 'value', value: 'payload P' },
      predicate: pathParameterEquals('fundId', 'abc'),
    });
  });

  test('a request using the generator spelling matches and yields the payload', async () => {
    const request = createRequestDescriptor({
      method: 'GET',
      urlTemplate: '{+baseurl}/api/funds/{fund-id}',
      pathParameters: { 'fund-id': 'abc' },
    });
    assert.equal(await adapter.send(request, parseString), 'payload P');
  });

  test('the same request with another id does not match', async () => {
    const request = createRequestDescriptor({
      method: 'GET',
      urlTemplate: '{+baseurl}/api/funds/{fund-id}',
      pathParameters: { 'fund-id': 'xyz' },
    });
    assert.equal(adapter.findMatch('object', request), undefined);
    assert.equal(await adapter.send(request, parseString), undefined);
  });

  test('a nested endpoint does not match', async () => {
    const request = createRequestDescriptor({
      method: 'GET',
      urlTemplate: '{+baseurl}/api/funds/{fund-id}/activities',
      pathParameters: { 'fund-id': 'abc' },
    });
    assert.equal(adapter.findMatch('object', request), undefined);
  });
});

describe('end to end: generated client', () => {
  let client: FundsClient;

  beforeEach(() => {
    client = createMockableClient(FundsClient, {
      logger: silent,
      baseUrl: 'http://localhost',
      onUnmatched: 'throw',
    });
  });

  test('builder and template mocks work side by side', async () => {
    const alpha: Fund = { id: 'abc', name: 'Alpha' };
    const beta: Fund = { id: 'xyz', name: 'Beta' };
    mockGet(client.funds.byFundId('abc'), alpha);
    mockClientResponse(client, getUrlTemplate(client.funds.byFundId('xyz')), beta, {
      method: 'GET',
      pathParameters: { fundId: 'xyz' },
    });
    mockClientCollectionResponse(client, '/api/funds{?top,search}', [alpha, beta], {
      method: 'GET',
    });
    mockDelete(client.funds.byFundId('abc'));

    assert.deepEqual(await client.funds.byFundId('abc').get(), alpha);
    assert.deepEqual(await client.funds.byFundId('xyz').get(), beta);
    assert.deepEqual(await client.funds.get({ search: 'a' }), [alpha, beta]);
    await client.funds.byFundId('abc').delete();

    const received = getMockAdapter(client).received.map(
      (request) => `${request.method} ${normalizeUrlTemplate(request.urlTemplate)}`,
    );
    assert.deepEqual(received, [
      'GET /api/funds/{pathParam1}{?queryParam1}',
      'GET /api/funds/{pathParam1}{?queryParam1}',
      'GET /api/funds{?queryParam1,queryParam2}',
      'DELETE /api/funds/{pathParam1}{?queryParam1}',
    ]);
  });

  test('an unconfigured call rejects with the normalized template', async () => {
    mockGet(client.funds.byFundId('abc'), { id: 'abc', name: 'Alpha' });

    await assert.rejects(client.funds.byFundId('abc').activities.get(), (err: unknown) => {
      assert.ok(err instanceof UnconfiguredRequestError);
      assert.equal(err.normalizedTemplate, '/api/funds/{pathParam1}/activities');
      assert.equal(err.registeredExpectations, 1);
      return true;
    });
  });

  test('a wrong logical name tells the author which keys exist', async () => {
    mockClientResponse(client, '/api/funds/{id}{?select}', { id: 'abc', name: 'Alpha' }, {
      pathParameters: { fundCode: 'abc' },
    });

    await assert.rejects(client.funds.byFundId('abc').get(), (err: unknown) => {
      assert.ok(err instanceof UnconfiguredRequestError);
      const [missing] = err.missingParameters;
      assert.ok(missing instanceof ParameterNotFoundError);
      assert.deepEqual(missing.attemptedVariations, [
        'fundCode',
        'fund-code',
        'fund%2Dcode',
        'FundCode',
      ]);
      assert.deepEqual(missing.availableKeys, ['baseurl', 'fund%2Did']);
      return true;
    });
  });

  test('recorded requests expose parameters by logical name', async () => {
    mockDelete(client.funds.byFundId('abc'));
    await client.funds.byFundId('abc').delete();

    const [request] = getMockAdapter(client).receivedFor('DELETE', '/api/funds/{fundId}{?select}');
    assert.ok(request);
    assert.equal(getPathParameter(request, 'fundId'), 'abc');
  });
});
