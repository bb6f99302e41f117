import { Logger } from '@nestjs/common';
import { MockAgent } from 'undici';
import {
  MerchantApiClient,
  MerchantApiService,
  WithdrawalOutcome,
  interpretWithdrawal,
} from '../../src';

const ORIGIN = 'http://merchant.test';

describe('MerchantApiService', () => {
  let agent: MockAgent;
  let service: MerchantApiService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    agent = new MockAgent();
    agent.disableNetConnect();
    service = new MerchantApiService(
      new MerchantApiClient({ baseUrl: `${ORIGIN}/api/v1`, dispatcher: agent }),
    );
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await agent.close();
  });

  it('should fetch the merchant summary', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/api/v1/merchant/info',
        method: 'GET',
        headers: { 'x-api-key': 'token-alpha' },
      })
      .reply(200, { balance: 3 });

    await expect(service.getMerchantInfo('token-alpha')).resolves.toEqual({ balance: 3 });
  });

  it('should bound the merchant summary call to five seconds', async () => {
    const client = new MerchantApiClient({ baseUrl: `${ORIGIN}/api/v1`, dispatcher: agent });
    const getSpy = jest.spyOn(client, 'get').mockResolvedValue({});

    await new MerchantApiService(client).getMerchantInfo('token-alpha');

    expect(getSpy).toHaveBeenCalledWith('merchant/info', 'token-alpha', { timeoutMs: 5000 });
  });

  it('should request the last ten payments without closed ones by default', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/payments/history?limit=10&with_closed=false', method: 'GET' })
      .reply(200, { count: 0, payments: [] });

    await expect(service.getPaymentHistory('token-alpha')).resolves.toEqual({
      count: 0,
      payments: [],
    });
  });

  it('should pass explicit history options', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/payments/history?limit=3&with_closed=true', method: 'GET' })
      .reply(200, { count: 0, payments: [] });

    await expect(
      service.getPaymentHistory('token-alpha', { limit: 3, withClosed: true }),
    ).resolves.toEqual({ count: 0, payments: [] });
  });

  it('should URI-encode the payment lookup segment', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/payments/a%2Fb%20c', method: 'GET' })
      .reply(200, { id: 'a/b c' });

    await expect(service.getPayment('token-alpha', 'a/b c')).resolves.toEqual({ id: 'a/b c' });
  });

  it('should post the destination address of a withdrawal', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/api/v1/merchant/balance/withdraw',
        method: 'POST',
        body: '{"to_address":"TAddr"}',
      })
      .reply(200, { success: true });

    await expect(service.requestWithdrawal('token-alpha', 'TAddr')).resolves.toEqual({
      success: true,
    });
  });
});

describe('interpretWithdrawal', () => {
  it('should report success only for success: true', () => {
    expect(interpretWithdrawal({ success: true })).toBe(WithdrawalOutcome.SUCCESS);
    expect(interpretWithdrawal({ success: 'true' })).toBe(WithdrawalOutcome.FAILED);
    expect(interpretWithdrawal({ status: 'success' })).toBe(WithdrawalOutcome.FAILED);
  });

  it('should recognize the below-minimum status', () => {
    expect(
      interpretWithdrawal({ success: false, status: 'under_minimum_withdrawal_amount' }),
    ).toBe(WithdrawalOutcome.BELOW_MINIMUM);
  });

  it('should treat anything else as a failure', () => {
    expect(interpretWithdrawal({ success: false, status: 'rejected' })).toBe(
      WithdrawalOutcome.FAILED,
    );
    expect(interpretWithdrawal('ok')).toBe(WithdrawalOutcome.FAILED);
    expect(interpretWithdrawal(null)).toBe(WithdrawalOutcome.FAILED);
  });
});
