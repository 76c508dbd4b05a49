import assert from 'node:assert/strict';
import test from 'node:test';
import { ParameterNotFoundError } from './errors';
import {
  isDeprecatedStrategy,
  matchBuilder,
  matchExpectation,
  matches,
  resolveStrategy,
} from './matcher';
import { pathParameterEquals, predicate } from './predicate';
import { ExpectationRegistry, type Expectation, type NewExpectation } from './registry';
import { createRequestDescriptor, getPathParameter } from './request';
import { normalizeUrlTemplate } from './template';

const fundTemplate = '{+baseurl}/api/funds/{fund%2Did}';

const fundRequest = createRequestDescriptor({
  method: 'GET',
  urlTemplate: fundTemplate,
  pathParameters: { baseurl: 'http://localhost', 'fund%2Did': 'abc' },
});

function expectation(overrides: Partial<NewExpectation> = {}): Expectation {
  const template = overrides.template ?? '/api/funds/{fundId}';
  return new ExpectationRegistry().register({
    method: 'GET',
    kind: 'object',
    strategy: 'structural',
    template,
    normalizedTemplate: normalizeUrlTemplate(template),
    outcome: { type: 'value', value: { id: 'abc' } },
    ...overrides,
  });
}

test('matchExpectation matches structurally equal templates with different names', () => {
  assert.deepEqual(matchExpectation(expectation(), fundRequest), { matched: true });
});

test('matchExpectation rejects a different method', () => {
  assert.deepEqual(matchExpectation(expectation({ method: 'POST' }), fundRequest), {
    matched: false,
    reason: 'method',
    detail: 'expected POST, got GET',
  });
  assert.equal(matches(expectation({ method: 'ANY' }), fundRequest), true);
});

test('matchExpectation rejects another send operation', () => {
  assert.deepEqual(matchExpectation(expectation(), fundRequest, { kind: 'collection' }), {
    matched: false,
    reason: 'kind',
    detail: 'expected object response, got collection',
  });
});

test('matchExpectation rejects nested paths', () => {
  const nested = createRequestDescriptor({
    method: 'GET',
    urlTemplate: `${fundTemplate}/activities`,
    pathParameters: { 'fund%2Did': 'abc' },
  });
  assert.deepEqual(matchExpectation(expectation(), nested), {
    matched: false,
    reason: 'template',
    detail: 'expected /api/funds/{pathParam1}, got /api/funds/{pathParam1}/activities',
  });
});

test('matchExpectation never matches a request without a template', () => {
  const bare = createRequestDescriptor({ method: 'GET' });
  assert.deepEqual(matchExpectation(expectation(), bare), {
    matched: false,
    reason: 'template',
    detail: 'expected /api/funds/{pathParam1}, got (no template)',
  });
});

test('matchExpectation applies the extra predicate last', () => {
  const wanted = expectation({ predicate: pathParameterEquals('fundId', 'abc') });
  const other = expectation({ predicate: pathParameterEquals('fundId', 'xyz') });

  assert.equal(matches(wanted, fundRequest), true);
  assert.deepEqual(matchExpectation(other, fundRequest), {
    matched: false,
    reason: 'predicate',
    detail: 'extra predicate returned false',
  });
});

test('matchExpectation skips the predicate when the template differs', () => {
  let calls = 0;
  const counted = expectation({
    template: '/api/accounts/{id}',
    predicate: predicate(() => {
      calls++;
      return true;
    }),
  });
  assert.equal(matches(counted, fundRequest), false);
  assert.equal(calls, 0);
});

test('matchExpectation reports parameters the predicate could not find', () => {
  const result = matchExpectation(
    expectation({ predicate: pathParameterEquals('accountId', 'abc') }),
    fundRequest,
  );

  assert.ok(!result.matched);
  assert.equal(result.reason, 'predicate');
  assert.equal(result.detail, 'extra predicate returned false');
  assert.equal(result.missingParameters?.length, 1);
  const [missing] = result.missingParameters ?? [];
  assert.ok(missing instanceof ParameterNotFoundError);
  assert.equal(missing.parameterName, 'accountId');
  assert.deepEqual(missing.availableKeys, ['baseurl', 'fund%2Did']);
});

test('matchExpectation turns a lookup failure inside the predicate into a mismatch', () => {
  const lookup = expectation({
    predicate: predicate((req) => getPathParameter(req, 'accountId') === 'abc'),
  });
  const result = matchExpectation(lookup, fundRequest);

  assert.ok(!result.matched);
  assert.equal(result.reason, 'predicate');
  assert.equal(
    result.detail,
    'extra predicate failed: Path parameter "accountId" was not found. ' +
      'Tried: accountId, account-id, account%2Did, AccountId. ' +
      'Template: {+baseurl}/api/funds/{fund%2Did} (normalized: /api/funds/{pathParam1}). ' +
      'Available keys: baseurl, fund%2Did (fund-id).',
  );
  assert.equal(result.missingParameters?.[0]?.parameterName, 'accountId');
});

test('matchExpectation lets other predicate errors through', () => {
  const broken = expectation({
    predicate: predicate(() => {
      throw new TypeError('bad predicate');
    }),
  });
  assert.throws(() => matchExpectation(broken, fundRequest), { message: 'bad predicate' });
});

test('matchExpectation honours ignoreCase', () => {
  const upper = expectation({ template: '/API/Funds/{id}' });
  assert.equal(matches(upper, fundRequest), true);
  assert.equal(matches(upper, fundRequest, { ignoreCase: false }), false);
});

test('matchBuilder compares raw templates and path parameters except baseurl', () => {
  const builder = {
    urlTemplate: fundTemplate,
    pathParameters: { baseurl: 'http://other', 'fund%2Did': 'abc' },
  };
  assert.deepEqual(matchBuilder(builder, fundRequest), { matched: true });

  assert.deepEqual(
    matchBuilder({ ...builder, pathParameters: { 'fund%2Did': 'xyz' } }, fundRequest),
    { matched: false, reason: 'path-parameter', detail: 'fund%2Did: expected "xyz", got "abc"' },
  );
  assert.deepEqual(
    matchBuilder({ ...builder, pathParameters: { fundId: 'abc' } }, fundRequest),
    { matched: false, reason: 'path-parameter', detail: 'request has no path parameter "fundId"' },
  );
  assert.deepEqual(
    matchBuilder({ ...builder, urlTemplate: '{+baseurl}/api/funds/{id}' }, fundRequest),
    {
      matched: false,
      reason: 'template',
      detail: 'expected {+baseurl}/api/funds/{id}, got {+baseurl}/api/funds/{fund%2Did}',
    },
  );
});

test('builder strategy uses builder identity instead of structure', () => {
  const byBuilder = expectation({
    strategy: 'builder',
    template: fundTemplate,
    builder: { urlTemplate: fundTemplate, pathParameters: { 'fund%2Did': 'xyz' } },
  });
  assert.equal(matches(byBuilder, fundRequest), false);
});

test('resolveStrategy maps deprecated names to structural', () => {
  assert.equal(resolveStrategy('suffix'), 'structural');
  assert.equal(resolveStrategy('token'), 'structural');
  assert.equal(resolveStrategy('builder'), 'builder');
  assert.equal(isDeprecatedStrategy('suffix'), true);
  assert.equal(isDeprecatedStrategy('structural'), false);
});
