import { WithdrawalOutcome } from '../domain/enums';
import { PaymentHistoryQuery, isRecord } from '../domain/models';
import { Credential } from '../credentials';
import { MerchantApiClient } from './merchant-api.client';

/**
 * Shorter bound for the account summary, shown on every menu refresh
 */
export const MERCHANT_INFO_TIMEOUT_MS = 5000;

export const DEFAULT_HISTORY_LIMIT = 10;

export const BELOW_MINIMUM_WITHDRAWAL_STATUS = 'under_minimum_withdrawal_amount';

/**
 * One method per merchant API endpoint the bot uses.
 *
 * Results are returned undecoded (unknown); formatting code narrows them.
 */
export class MerchantApiService {
  constructor(private readonly client: MerchantApiClient) {}

  async getMerchantInfo(credential: Credential): Promise<unknown> {
    return this.client.get('merchant/info', credential, {
      timeoutMs: MERCHANT_INFO_TIMEOUT_MS,
    });
  }

  async getPaymentHistory(
    credential: Credential,
    query: PaymentHistoryQuery = {},
  ): Promise<unknown> {
    return this.client.get('payments/history', credential, {
      query: {
        limit: query.limit ?? DEFAULT_HISTORY_LIMIT,
        with_closed: query.withClosed ?? false,
      },
    });
  }

  /**
   * Look up a payment by its id or by its deposit address
   */
  async getPayment(credential: Credential, idOrAddress: string): Promise<unknown> {
    return this.client.get(
      `payments/${encodeURIComponent(idOrAddress)}`,
      credential,
    );
  }

  async requestWithdrawal(credential: Credential, toAddress: string): Promise<unknown> {
    return this.client.post('merchant/balance/withdraw', credential, {
      body: { to_address: toAddress },
    });
  }
}

/**
 * Classify a withdrawal decision payload.
 *
 * Success is signalled by `success: true` only; `status` is consulted for
 * the below-minimum case and nothing else.
 */
export function interpretWithdrawal(payload: unknown): WithdrawalOutcome {
  if (!isRecord(payload)) {
    return WithdrawalOutcome.FAILED;
  }

  if (payload.success === true) {
    return WithdrawalOutcome.SUCCESS;
  }

  if (payload.status === BELOW_MINIMUM_WITHDRAWAL_STATUS) {
    return WithdrawalOutcome.BELOW_MINIMUM;
  }

  return WithdrawalOutcome.FAILED;
}
