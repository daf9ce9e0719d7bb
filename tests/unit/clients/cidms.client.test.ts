/**
 * CIDMS client unit tests
 *
 * Response interpretation and HTTP status mapping, against a stubbed
 * axios adapter.
 */

import axios, { AxiosError } from 'axios';

import { CidmsKeyIssuer, parseCidmsBody } from '../../../src/clients/cidms.client';
import { KeyIssuanceError } from '../../../src/clients/key-issuer';
import { StubReply, stubAdapter } from '../../helpers/axiosStub';

const OPTIONS = {
  url: 'https://keys.example.test/api',
  apiKey: 'test-key',
  timeoutMs: 1000,
  userAgent: 'cid-ledger-test',
};

const IID = '2'.repeat(63);

const issuerReplying = (reply: () => StubReply | Promise<StubReply>) => {
  const stub = stubAdapter(reply);
  const http = axios.create({ adapter: stub.adapter, transformResponse: (data: unknown) => data });
  return { issuer: new CidmsKeyIssuer(OPTIONS, http), requests: stub.requests };
};

describe('parseCidmsBody', () => {
  it('should return the confirmation id of a successful JSON answer', () => {
    expect(parseCidmsBody('{"result":"Successfully","confirmationid":"123456-654321"}')).toBe(
      '123456-654321'
    );
  });

  it('should treat a reported execution error as a rejection', () => {
    expect(() => parseCidmsBody('{"errorexecuting":"Blocked IID","hadoccurred":1}')).toThrow(
      new KeyIssuanceError('rejected', 'Blocked IID')
    );
  });

  it('should treat an unknown JSON answer as unavailable', () => {
    expect.assertions(2);
    try {
      parseCidmsBody('{"result":"Queued"}');
    } catch (error) {
      expect(error).toBeInstanceOf(KeyIssuanceError);
      expect(error).toHaveProperty('kind', 'unavailable');
    }
  });

  it('should accept a bare confirmation id', () => {
    expect(parseCidmsBody('  987654321098765  ')).toBe('987654321098765');
  });

  it('should reject bare text mentioning a block', () => {
    expect(() => parseCidmsBody('IID is Blocked')).toThrow('IID is Blocked');
  });

  it('should reject answers too short to be a confirmation id', () => {
    expect(() => parseCidmsBody('ok')).toThrow('Key service returned no usable confirmation id');
  });
});

describe('CidmsKeyIssuer', () => {
  it('should send the installation id and api key as query parameters', async () => {
    const { issuer, requests } = issuerReplying(() => ({
      status: 200,
      data: '{"result":"Successfully","confirmationid":"111111-222222"}',
    }));

    await expect(issuer.issueConfirmationId(IID)).resolves.toBe('111111-222222');
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(OPTIONS.url);
    expect(requests[0].params).toEqual({ iids: IID, justforcheck: 0, apikey: 'test-key' });
  });

  it.each([
    [400, 'rejected', 'Installation id blocked by the key service'],
    [403, 'rejected', 'Installation id blocked by the key service'],
    [401, 'unavailable', 'Key service authentication failed'],
    [429, 'unavailable', 'Key service rate limit reached, try again later'],
    [502, 'unavailable', 'Key service error (status 502)'],
  ])('should map status %i to a %s failure', async (status, kind, message) => {
    const { issuer } = issuerReplying(() => ({ status, data: '' }));

    await expect(issuer.issueConfirmationId(IID)).rejects.toMatchObject({ kind, message });
  });

  it('should report a timeout as unavailable', async () => {
    const { issuer } = issuerReplying(() => {
      throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED');
    });

    await expect(issuer.issueConfirmationId(IID)).rejects.toMatchObject({
      kind: 'unavailable',
      message: 'Key service timed out',
    });
  });

  it('should report a refused connection as unavailable', async () => {
    const { issuer } = issuerReplying(() => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    });

    await expect(issuer.issueConfirmationId(IID)).rejects.toMatchObject({
      kind: 'unavailable',
      message: 'Key service unreachable: connect ECONNREFUSED',
    });
  });
});
