/**
 * Decision reported by the merchant API for a withdrawal request
 */
export enum WithdrawalOutcome {
  SUCCESS = 'success',

  /**
   * Balance is below the minimum withdrawal threshold
   */
  BELOW_MINIMUM = 'below_minimum',

  /**
   * Any other negative or unrecognized answer
   */
  FAILED = 'failed',
}
